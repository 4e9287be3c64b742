/**
 * Turns a user-assigned resource name into an HCL identifier:
 * anything outside [A-Za-z0-9_] becomes "_" and the result is lower-cased.
 */
export function sanitizeName(name: string): string {
  return name.replaceAll(/\W/g, '_').toLowerCase();
}
