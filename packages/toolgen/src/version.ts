/**
 * Version reported by the CLI. Taken from the package manifest when run
 * through npm scripts.
 */
export const LIB_VERSION =
  (typeof process !== "undefined" && process.env?.npm_package_version) ||
  "0.0.0";
