/**
 * Error taxonomy shared by every service.
 *
 * Services throw one of the classes below; callers that only need a banner
 * wrap the call with {@link toOutcome}.
 */

export type ErrorCategory = "auth" | "validation" | "store" | "notFound" | "unknown";

export type ValidationReason =
  | "storyEmpty"
  | "storyTooLong"
  | "invalidInvitationCode"
  | "displayNameTooShort"
  | "displayNameTooLong"
  | "invalidDisplayName"
  | "invalidEmail"
  | "invalidConfig"
  | "invalidInvitation"
  | "invalidDate";

const ERROR_MESSAGES: Record<ErrorCategory, string> = {
  auth: "You need to be signed in to do that.",
  validation: "Please check your input and try again.",
  store: "Unable to reach the story service. Please try again.",
  notFound: "The requested item was not found.",
  unknown: "An unexpected error occurred. Please try again.",
};

const VALIDATION_MESSAGES: Record<ValidationReason, string> = {
  storyEmpty: "Story text cannot be empty",
  storyTooLong: "Story text must be 10,000 characters or less",
  invalidInvitationCode: "Invitation code must be 6 letters or numbers, without I, O, 0 or 1",
  displayNameTooShort: "Display name must be at least 2 characters",
  displayNameTooLong: "Display name must be 50 characters or less",
  invalidDisplayName: "Display name may only contain letters, numbers, spaces, - and '",
  invalidEmail: "Please enter a valid email address",
  invalidConfig: "Configuration is invalid",
  invalidInvitation: "This invitation can no longer be accepted",
  invalidDate: "Dates must be written as yyyy-MM-dd",
};

export class DaydreamsError extends Error {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DaydreamsError";
    this.category = category;
  }
}

export class AuthRequiredError extends DaydreamsError {
  constructor(operation: string) {
    super("auth", `Operation "${operation}" requires a signed-in user`);
    this.name = "AuthRequiredError";
  }
}

export class ValidationError extends DaydreamsError {
  readonly reason: ValidationReason;

  constructor(reason: ValidationReason, details?: string) {
    super("validation", details ? `${VALIDATION_MESSAGES[reason]}: ${details}` : VALIDATION_MESSAGES[reason]);
    this.name = "ValidationError";
    this.reason = reason;
  }
}

export class StoreError extends DaydreamsError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("store", `${message} (${path})`, options);
    this.name = "StoreError";
    this.path = path;
  }
}

export class NotFoundError extends DaydreamsError {
  constructor(what: string) {
    super("notFound", `${what} was not found`);
    this.name = "NotFoundError";
  }
}

export type CategorizedError = {
  category: ErrorCategory;
  message: string;
  details?: string;
};

/**
 * Map any thrown value to a category and a user-facing message.
 */
export function categorizeError(error: unknown): CategorizedError {
  if (error instanceof ValidationError) {
    return { category: "validation", message: VALIDATION_MESSAGES[error.reason], details: error.message };
  }
  if (error instanceof DaydreamsError) {
    return { category: error.category, message: ERROR_MESSAGES[error.category], details: error.message };
  }
  if (error instanceof Error) {
    if (error.name === "AbortError") {
      return { category: "unknown", message: "The request was cancelled.", details: error.message };
    }
    const message = error.message.toLowerCase();
    if (message.includes("network") || message.includes("fetch") || message.includes("timed out")) {
      return { category: "store", message: ERROR_MESSAGES.store, details: error.message };
    }
    return { category: "unknown", message: ERROR_MESSAGES.unknown, details: error.message };
  }
  return { category: "unknown", message: ERROR_MESSAGES.unknown };
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; category: ErrorCategory; message: string };

/**
 * Settle a call into a success flag plus message for transient banners.
 */
export async function toOutcome<T>(promise: Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await promise };
  } catch (error) {
    const { category, message, details } = categorizeError(error);
    console.warn("[Daydreams]", details ?? message);
    return { ok: false, category, message };
  }
}
