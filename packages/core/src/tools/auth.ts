/**
 * Authorization gate
 */

/**
 * A tool with no required auth services is open to everyone; otherwise the
 * caller must have verified at least one of the listed services.
 */
export function isAuthorized(
  authRequired: readonly string[],
  verifiedAuthServices: readonly string[]
): boolean {
  if (authRequired.length === 0) {
    return true;
  }
  const verified = new Set(verifiedAuthServices);
  return authRequired.some((service) => verified.has(service));
}
