export * from "./schema/suite_v1alpha1"; // Suite/Test/Case/Assertion config model
