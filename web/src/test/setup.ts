import { afterEach } from "vitest";
import { cleanup } from "@testing-library/react";
import { setLogLevel } from "@/lib/logger";

setLogLevel("silent");

afterEach(() => {
  cleanup();
});
