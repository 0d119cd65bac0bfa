/**
 * Email syntax validator and domain extractor.
 * Deliberately permissive: one `@`-free local part, one `@`-free domain part
 * containing a dot, no whitespace anywhere.
 */

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

/**
 * Check whether an address is syntactically acceptable
 *
 * @param email - Candidate address, surrounding whitespace is ignored
 */
export function isValidEmail(email: string): boolean {
  const trimmedEmail = email.trim();

  if (!trimmedEmail) {
    return false;
  }

  return EMAIL_PATTERN.test(trimmedEmail);
}

/**
 * Extract the lower-cased domain of an address.
 * Callers must run isValidEmail first.
 *
 * @throws Error if the address has no `@`
 */
export function extractDomain(email: string): string {
  const trimmedEmail = email.trim();
  const atIndex = trimmedEmail.indexOf('@');

  if (atIndex === -1) {
    throw new Error(`Cannot extract domain from address without "@": "${trimmedEmail}"`);
  }

  return trimmedEmail.slice(atIndex + 1).trim().toLowerCase();
}
