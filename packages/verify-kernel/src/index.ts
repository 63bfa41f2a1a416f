// @rulecheck/verify-kernel
// Entry point exports for the suite verification engine. IO-free: files come in
// through a FileProvider, policy evaluation through a RuleClient.

export * from "./runner";
export * from "./errors/verify_errors";
export * from "./inputs/file_provider";
export * from "./inputs/resource_decoder";
export * from "./client/rule_client";
export * from "./loader/policy_loader";
export * from "./evaluator/violation_evaluator";
export * from "./assertions/assertion_matcher";
export * from "./filter/run_filter";
export * from "./results/suite_results";
export * from "./logger";
