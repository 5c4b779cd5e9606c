export const MODULE_NAME_REGEX = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

export const MODULE_NAME_ERROR_MESSAGE =
  "Module name must start with a letter, digit or underscore and contain only letters, digits, '_', '.', '-'";

export function isValidModuleName(name: string): boolean {
  return MODULE_NAME_REGEX.test(name);
}
