import type { RawOrderLine } from "@teabase/contracts";

export type ValidationError = {
  sheet: string;
  rowNumber: number | null;
  code: string;
  message: string;
};

export type PosCleanStats = {
  sourceRows: number;
  paymentRows: number;
  refundRows: number;
  paymentQty: number;
  refundQty: number;
  rewardRows: number;
  rewardQty: number;
  fixedIceRows: number;
  invalidRows: number;
  keptRows: number;
};

export type PosExportParseResult = {
  lines: RawOrderLine[];
  stats: PosCleanStats;
  errors: ValidationError[];
};
