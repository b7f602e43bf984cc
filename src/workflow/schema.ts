import { z } from 'zod';
import { SpecValidationError } from './errors.js';

export const START = 'START';
export const END = 'END';

const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export interface StateFieldDeclaration {
  type: string;
  required?: boolean;
  default?: unknown;
  description?: string;
  schema?: Record<string, string | StateFieldDeclaration>;
}

export const stateFieldSchema: z.ZodType<StateFieldDeclaration> = z.lazy(() =>
  z
    .object({
      type: z.string(),
      required: z.boolean().optional(),
      default: z.unknown().optional(),
      description: z.string().optional(),
      schema: z.record(z.union([z.string(), stateFieldSchema])).optional(),
    })
    .strict(),
);

export const llmConfigSchema = z
  .object({
    provider: z.string().optional(),
    model: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().positive().optional(),
    api_base: z.string().optional(),
  })
  .strict();

export const outputSchemaSchema = z
  .object({
    type: z.string(),
    fields: z
      .array(
        z.object({
          name: z.string(),
          type: z.string(),
          description: z.string().optional(),
        }),
      )
      .optional(),
    description: z.string().optional(),
  })
  .strict();

export const toolReferenceSchema = z.union([
  z.string(),
  z.object({
    name: z.string(),
    on_error: z.enum(['fail', 'continue']).default('fail'),
  }),
]);

export const sandboxConfigSchema = z
  .object({
    preset: z.enum(['low', 'medium', 'high', 'max']).default('medium'),
    timeout: z.number().int().positive().optional(),
  })
  .strict();

export const nodeSchema = z
  .object({
    id: z
      .string()
      .regex(IDENTIFIER, 'Node id must be a valid identifier')
      .refine((id) => id !== START && id !== END, 'START and END are reserved node ids'),
    description: z.string().optional(),
    inputs: z.record(z.string()).optional(),
    prompt: z.string().optional(),
    output_schema: outputSchemaSchema,
    outputs: z.array(z.string()).default([]),
    tools: z.array(toolReferenceSchema).optional(),
    llm: llmConfigSchema.optional(),
    code: z.string().optional(),
    sandbox: sandboxConfigSchema.optional(),
    retry: z.object({ max_attempts: z.number().int().min(1).max(10).optional() }).strict().optional(),
  })
  .strict()
  .refine((node) => node.prompt !== undefined || node.code !== undefined, {
    message: 'Node must declare a prompt or a code block',
  });

const routeSchema = z.object({
  condition: z.object({ logic: z.string().min(1) }),
  to: z.string(),
});

const loopSchema = z
  .object({
    max_iterations: z.number().int().min(1).max(100).default(10),
    until: z.string().optional(),
    condition_field: z.string().optional(),
    target: z.string().optional(),
    exit_to: z.string().default(END),
  })
  .strict()
  .refine((loop) => (loop.until === undefined) !== (loop.condition_field === undefined), {
    message: 'Loop must declare exactly one of until or condition_field',
  });

const joinModeSchema = z.enum(['all_settled', 'all_or_nothing']).default('all_settled');

const parallelSchema = z.union([
  z
    .object({
      targets: z.array(z.string()).min(1),
      join: z.string(),
      join_mode: joinModeSchema,
    })
    .strict(),
  z
    .object({
      items_field: z.string(),
      target: z.string(),
      collect_field: z.string(),
      join: z.string(),
      join_mode: joinModeSchema,
    })
    .strict(),
]);

export const edgeSchema = z
  .object({
    from: z.string(),
    to: z.string().optional(),
    routes: z.array(routeSchema).min(1).optional(),
    loop: loopSchema.optional(),
    parallel: parallelSchema.optional(),
  })
  .strict()
  .refine(
    (edge) =>
      [edge.to, edge.routes, edge.loop, edge.parallel].filter((value) => value !== undefined).length === 1,
    { message: 'Edge must declare exactly one of to, routes, loop or parallel' },
  );

const gateSchema = z.object({
  metric: z.string(),
  max: z.number().optional(),
  min: z.number().optional(),
});

export const workflowSpecSchema = z
  .object({
    schema_version: z.literal('1.0'),
    flow: z.object({
      name: z.string().min(1),
      description: z.string().optional(),
      version: z.string().optional(),
    }),
    state: z.object({
      fields: z.record(stateFieldSchema),
    }),
    nodes: z.array(nodeSchema).min(1, 'Workflow must have at least one node'),
    edges: z.array(edgeSchema).min(1, 'Workflow must have at least one edge'),
    config: z
      .object({
        llm: llmConfigSchema.optional(),
        execution: z
          .object({
            timeout: z.number().positive().default(120),
            max_retries: z.number().int().min(0).default(3),
          })
          .optional(),
        gates: z
          .object({
            gates: z.array(gateSchema).default([]),
            on_fail: z.enum(['warn', 'fail']).default('warn'),
          })
          .optional(),
      })
      .optional(),
  })
  .superRefine((spec, ctx) => {
    const seen = new Set<string>();
    for (const node of spec.nodes) {
      if (seen.has(node.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate node id: ${node.id}`, path: ['nodes'] });
      }
      seen.add(node.id);
    }
  });

export type WorkflowSpec = z.infer<typeof workflowSpecSchema>;
export type WorkflowSpecInput = z.input<typeof workflowSpecSchema>;
export type NodeDeclaration = z.infer<typeof nodeSchema>;
export type EdgeDeclaration = z.infer<typeof edgeSchema>;
export type ParallelDeclaration = z.infer<typeof parallelSchema>;
export type OutputSchemaDeclaration = z.infer<typeof outputSchemaSchema>;
export type LlmConfigDeclaration = z.infer<typeof llmConfigSchema>;
export type SandboxConfigDeclaration = z.infer<typeof sandboxConfigSchema>;
export type GateDeclaration = z.infer<typeof gateSchema>;

export function parseWorkflowSpec(raw: unknown): WorkflowSpec {
  const result = workflowSpecSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new SpecValidationError('Invalid workflow document', issues);
  }
  return result.data;
}
