import { ValidationError } from "./errors";

export const MAX_STORY_LENGTH = 10_000;

const INVISIBLE_CHARACTERS = /[\u200B\u200C\u200D\uFEFF]/g;
const EMAIL_PATTERN = /^[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}$/i;
const DISPLAY_NAME_PATTERN = /^[\p{L}\p{N}\s'-]+$/u;
const ALPHANUMERIC = /[\p{L}\p{N}]/u;
/** Uppercase letters and digits without the look-alikes I, O, 0 and 1. */
export const INVITATION_CODE_ALPHABET = "ABCDEFGHJKLMNPQRSTUVWXYZ23456789";
const INVITATION_CODE_PATTERN = /^[A-HJ-NP-Z2-9]{6}$/;

/** Strip angle brackets and zero-width characters. */
export function sanitizeText(text: string): string {
  return text.replace(/[<>]/g, "").replace(INVISIBLE_CHARACTERS, "");
}

export function validateStoryText(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) throw new ValidationError("storyEmpty");
  if (trimmed.length > MAX_STORY_LENGTH) throw new ValidationError("storyTooLong");
  return sanitizeText(trimmed);
}

export function validateInvitationCode(code: string): string {
  const cleaned = code.trim().toUpperCase();
  if (!INVITATION_CODE_PATTERN.test(cleaned)) throw new ValidationError("invalidInvitationCode");
  return cleaned;
}

export function validateDisplayName(name: string): string {
  const trimmed = name.trim();
  const length = [...trimmed].length;
  if (length < 2) throw new ValidationError("displayNameTooShort");
  if (length > 50) throw new ValidationError("displayNameTooLong");
  if (!ALPHANUMERIC.test(trimmed) || !DISPLAY_NAME_PATTERN.test(trimmed)) {
    throw new ValidationError("invalidDisplayName");
  }
  return trimmed;
}

export function validateEmail(email: string): string {
  const trimmed = email.trim().toLowerCase();
  if (!EMAIL_PATTERN.test(trimmed)) throw new ValidationError("invalidEmail");
  return trimmed;
}
