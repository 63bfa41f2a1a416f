// @rulecheck/suite-harness
// Filesystem side of rulecheck: node:fs file provider, suite discovery and batch runs.
//
// Hard boundary: this is the only package that reads from disk.

export * from "./fs_file_provider";
export * from "./suite_file_harness";
export * from "./harness_config";
