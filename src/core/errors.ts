export type DashboardErrorCode = "SOURCE_NOT_FOUND" | "SCHEMA_INVALID" | "INVALID_FILTER";

export class DashboardError extends Error {
  readonly code: DashboardErrorCode;

  constructor(code: DashboardErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class SourceNotFoundError extends DashboardError {
  readonly path: string;

  constructor(path: string) {
    super("SOURCE_NOT_FOUND", `Data file not found: ${path}`);
    this.path = path;
  }
}

export class SchemaInvalidError extends DashboardError {
  readonly missingColumns: readonly string[];
  readonly view?: string;

  constructor(missingColumns: readonly string[], view?: string) {
    const scope = view ? ` for view "${view}"` : "";
    super("SCHEMA_INVALID", `Missing required column(s)${scope}: ${missingColumns.join(", ")}`);
    this.missingColumns = missingColumns;
    this.view = view;
  }
}

export class InvalidFilterError extends DashboardError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("INVALID_FILTER", `Invalid filter: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
