/**
 * Error codes for configuration problems. Every fatal error raised while
 * loading reference tables or run constants carries one of these.
 */
export const ErrorCode = {
  MISSING_REFERENCE_TABLE: "MISSING_REFERENCE_TABLE",
  INVALID_REFERENCE_ROW: "INVALID_REFERENCE_ROW",
  BLEND_SHARE_SUM: "BLEND_SHARE_SUM",
  INVALID_CONSTANT: "INVALID_CONSTANT",
  MISSING_ICE_BUCKET: "MISSING_ICE_BUCKET",
  INVALID_DATE_RANGE: "INVALID_DATE_RANGE",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ConfigurationIssue = {
  table: string;
  rowNumber: number | null;
  message: string;
};

/**
 * Fatal: a required table or constant is missing or malformed. A run that
 * hits one must stop before writing any output.
 */
export class ConfigurationError extends Error {
  readonly code: ErrorCodeType;
  readonly issues: ConfigurationIssue[];

  constructor(code: ErrorCodeType, message: string, issues: ConfigurationIssue[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.code = code;
    this.issues = issues;
  }
}

export function formatIssues(issues: ConfigurationIssue[]): string {
  return issues
    .map((issue) => `${issue.table}${issue.rowNumber === null ? "" : ` row ${issue.rowNumber}`}: ${issue.message}`)
    .join("\n");
}
