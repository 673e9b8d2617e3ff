export type CourseIndexErrorCode =
  | "FETCH_FAILED"
  | "VALIDATION_FAILED"
  | "COURSE_NOT_FOUND"
  | "MALFORMED_RECORD"
  | "INVALID_METHOD"
  | "INVALID_DICTIONARY"
  | "INVALID_SEED"
  | "STORAGE_FAILED";

export class CourseIndexError extends Error {
  code: CourseIndexErrorCode;
  details?: Record<string, unknown>;

  constructor(
    code: CourseIndexErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CourseIndexError";
    this.code = code;
    this.details = details;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isCourseIndexError(
  error: unknown,
  code?: CourseIndexErrorCode,
): error is CourseIndexError {
  if (!(error instanceof CourseIndexError)) return false;
  return code === undefined || error.code === code;
}
