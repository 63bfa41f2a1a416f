// @rulecheck/template-admission
// Admission for decoded ConstraintTemplate / constraint documents (identity, version, shape).

export * from "./admission/constraint_template_zod";
export * from "./admission/constraint_template_admission";
