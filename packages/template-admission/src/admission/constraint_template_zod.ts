import { z } from "zod"; // zod: structural admission for decoded template/constraint documents

export const TEMPLATES_GROUP = "templates.gatekeeper.sh"; // API group of ConstraintTemplate
export const CONSTRAINTS_GROUP = "constraints.gatekeeper.sh"; // API group of every generated constraint kind
export const TEMPLATE_KIND = "ConstraintTemplate";

// Versions this engine can admit; anything else in the right group is UNSUPPORTED_VERSION.
export const SUPPORTED_VERSIONS = Object.freeze(["v1alpha1", "v1beta1", "v1"] as const);

const ObjectMetaZ = z
  .object({
    name: z.string().min(1),
    namespace: z.string().optional(),
    labels: z.record(z.string()).optional(),
    annotations: z.record(z.string()).optional()
  })
  .passthrough(); // metadata carries server-side fields we do not care about

export const TemplateTargetZ = z
  .object({
    target: z.string().min(1), // e.g. admission.k8s.gatekeeper.sh
    rego: z.string().optional(), // policy body handed to the rule client as-is
    libs: z.array(z.string()).optional()
  })
  .passthrough(); // backend-specific code blocks pass through untouched

export const ConstraintTemplateZ = z.object({
  apiVersion: z.string().min(1),
  kind: z.literal(TEMPLATE_KIND),
  metadata: ObjectMetaZ,
  spec: z.object({
    crd: z.object({
      spec: z.object({
        names: z.object({
          kind: z.string().min(1), // constraint kind this template governs
          shortNames: z.array(z.string()).optional()
        }),
        validation: z.record(z.unknown()).optional() // parameter schema, opaque here
      })
    }),
    targets: z.array(TemplateTargetZ).min(1)
  })
});

export const ConstraintZ = z.object({
  apiVersion: z.string().min(1),
  kind: z.string().min(1),
  metadata: ObjectMetaZ,
  spec: z
    .object({
      enforcementAction: z.string().optional(),
      match: z.record(z.unknown()).optional(),
      parameters: z.unknown().optional()
    })
    .passthrough()
    .optional()
});

export type ConstraintTemplate = z.infer<typeof ConstraintTemplateZ>;
export type Constraint = z.infer<typeof ConstraintZ>;
export type SupportedVersion = (typeof SUPPORTED_VERSIONS)[number];
