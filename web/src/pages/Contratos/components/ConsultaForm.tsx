// ConsultaForm — query parameters for the contracts search.
//
// Values are passed on as typed; validation happens in the pipeline so the
// form and any other caller get the same messages. Only the órgão code is
// mandatory. Unidade executora and "somente vigentes" never reach the
// portal: they filter the downloaded records.

import { useState } from "react";
import { Button } from "@/components/ui/Button";
import { parseDecimal } from "@/lib/parsers";
import type { Consulta, ConsultaFormValues } from "../types";

const INPUT_CLASSES =
  "w-full rounded-md border border-gray-300 px-3 py-1.5 text-sm placeholder-gray-400 focus:border-blue-500 focus:outline-none focus:ring-1 focus:ring-blue-500";

const LABEL_CLASSES = "mb-1 block text-xs font-medium text-gray-700";

export function toConsulta(values: ConsultaFormValues): Consulta {
  const minValue = values.minValue.trim()
    ? parseDecimal(values.minValue) ?? Number.NaN
    : undefined;

  return {
    agencyCode: values.agencyCode.trim(),
    filters: {
      supplierTaxId: values.supplierTaxId.trim() || undefined,
      validityStartFrom: values.validityStartFrom || undefined,
      validityEndTo: values.validityEndTo || undefined,
      minValue,
    },
    pageLimit: Number(values.pageLimit),
    executingUnitCode: values.executingUnitCode.trim(),
    onlyCurrentlyValid: values.onlyCurrentlyValid,
  };
}

interface ConsultaFormProps {
  defaultPageLimit: number;
  loading: boolean;
  onSubmit: (consulta: Consulta) => void;
}

export function ConsultaForm({ defaultPageLimit, loading, onSubmit }: ConsultaFormProps) {
  const [values, setValues] = useState<ConsultaFormValues>({
    agencyCode: "",
    supplierTaxId: "",
    validityStartFrom: "",
    validityEndTo: "",
    minValue: "",
    pageLimit: String(defaultPageLimit),
    executingUnitCode: "",
    onlyCurrentlyValid: false,
  });

  function set<K extends keyof ConsultaFormValues>(key: K, value: ConsultaFormValues[K]) {
    setValues((prev) => ({ ...prev, [key]: value }));
  }

  function handleSubmit(e: React.FormEvent) {
    e.preventDefault();
    onSubmit(toConsulta(values));
  }

  return (
    <form onSubmit={handleSubmit} className="grid gap-4 sm:grid-cols-2 lg:grid-cols-4">
      <div>
        <label htmlFor="consulta-orgao" className={LABEL_CLASSES}>
          Código do órgão (SIAFI)
        </label>
        <input
          id="consulta-orgao"
          value={values.agencyCode}
          onChange={(e) => set("agencyCode", e.target.value)}
          placeholder="ex.: 26000"
          className={INPUT_CLASSES}
        />
      </div>

      <div>
        <label htmlFor="consulta-cnpj" className={LABEL_CLASSES}>
          CPF/CNPJ do fornecedor
        </label>
        <input
          id="consulta-cnpj"
          value={values.supplierTaxId}
          onChange={(e) => set("supplierTaxId", e.target.value)}
          className={INPUT_CLASSES}
        />
      </div>

      <div>
        <label htmlFor="consulta-inicio" className={LABEL_CLASSES}>
          Início da vigência a partir de
        </label>
        <input
          id="consulta-inicio"
          type="date"
          value={values.validityStartFrom}
          onChange={(e) => set("validityStartFrom", e.target.value)}
          className={INPUT_CLASSES}
        />
      </div>

      <div>
        <label htmlFor="consulta-fim" className={LABEL_CLASSES}>
          Fim da vigência até
        </label>
        <input
          id="consulta-fim"
          type="date"
          value={values.validityEndTo}
          onChange={(e) => set("validityEndTo", e.target.value)}
          className={INPUT_CLASSES}
        />
      </div>

      <div>
        <label htmlFor="consulta-valor" className={LABEL_CLASSES}>
          Valor mínimo (R$)
        </label>
        <input
          id="consulta-valor"
          inputMode="decimal"
          value={values.minValue}
          onChange={(e) => set("minValue", e.target.value)}
          className={INPUT_CLASSES}
        />
      </div>

      <div>
        <label htmlFor="consulta-paginas" className={LABEL_CLASSES}>
          Máximo de páginas
        </label>
        <input
          id="consulta-paginas"
          type="number"
          min={1}
          value={values.pageLimit}
          onChange={(e) => set("pageLimit", e.target.value)}
          className={INPUT_CLASSES}
        />
      </div>

      <div>
        <label htmlFor="consulta-unidade" className={LABEL_CLASSES}>
          Unidade executora
        </label>
        <input
          id="consulta-unidade"
          value={values.executingUnitCode}
          onChange={(e) => set("executingUnitCode", e.target.value)}
          placeholder="código UASG"
          className={INPUT_CLASSES}
        />
      </div>

      <div className="flex flex-col justify-end gap-3">
        <label className="flex items-center gap-2 text-sm text-gray-700">
          <input
            type="checkbox"
            checked={values.onlyCurrentlyValid}
            onChange={(e) => set("onlyCurrentlyValid", e.target.checked)}
          />
          Somente contratos vigentes
        </label>
        <Button type="submit" loading={loading}>
          Consultar
        </Button>
      </div>
    </form>
  );
}
