export type HourbookErrorCode =
  | "NOT_FOUND"
  | "STORE_CORRUPT"
  | "REFERENTIAL_INTEGRITY"
  | "VALIDATION";

export class HourbookError extends Error {
  readonly code: HourbookErrorCode;

  constructor(code: HourbookErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends HourbookError {
  constructor(entity: string, id: string) {
    super("NOT_FOUND", `${entity} not found: ${id}`);
  }
}

export class StoreLoadError extends HourbookError {
  readonly filePath: string;

  constructor(filePath: string, reason: string, cause?: unknown) {
    super("STORE_CORRUPT", `Unreadable store file ${filePath}: ${reason}`, { cause });
    this.filePath = filePath;
  }
}

export class ReferentialIntegrityError extends HourbookError {
  constructor(message: string) {
    super("REFERENTIAL_INTEGRITY", message);
  }
}

export class ValidationError extends HourbookError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("VALIDATION", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

export function isHourbookError(err: unknown): err is HourbookError {
  return err instanceof HourbookError;
}
