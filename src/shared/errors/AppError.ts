export type ErrorCode = "INVALID_CONFIG" | "INTERNAL";

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = "AppError";
  }
}

export const resolveError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }
  return new AppError("INTERNAL", "Internal error");
};
