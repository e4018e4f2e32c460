/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  MANIFEST_INVALID: 1,
  INPUT_INVALID: 2,
  SETTINGS_INVALID: 3,
} as const;
