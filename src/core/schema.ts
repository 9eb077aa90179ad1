import { z } from "zod";

// Scalars arrive as their source text; a bare `key:` arrives as null
const text = z
  .string()
  .nullable()
  .transform((value) => value ?? "");

// YAML 1.2 boolean spellings
const flag = z
  .string()
  .regex(/^(true|True|TRUE|false|False|FALSE)$/, "Expected true or false")
  .transform((value) => value.toLowerCase() === "true");

const integer = z
  .string()
  .regex(/^[-+]?\d+$/, "Expected an integer")
  .transform(Number);

function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const ParamDocumentSchema = z.object({
  name: z.string().min(1, "Parameter name is required"),
  type: optional(text),
  default: optional(text),
  description: optional(text),
  required: optional(flag),
  flag: optional(flag),
  position: optional(integer),
});

const CommandDocumentSchema = z.object({
  run: optional(text),
  dependencies: optional(z.array(z.string())),
  depends: optional(z.array(z.string())),
  description: optional(text),
  condition: optional(text),
  pre: optional(text),
  post: optional(text),
  timeout: optional(text),
  parallel: optional(flag),
  tasks: optional(z.array(text)),
  commands: optional(z.record(z.string(), text)),
  params: optional(z.array(ParamDocumentSchema)),
  workingdir: optional(text),
});

export const ProjectDocumentSchema = z.object({
  name: optional(text),
  workingdir: optional(text),
  variables: optional(z.record(z.string(), text)),
  commands: optional(z.record(z.string(), CommandDocumentSchema.nullable())),
});

export type ParamDocument = z.infer<typeof ParamDocumentSchema>;
export type CommandDocument = z.infer<typeof CommandDocumentSchema>;
export type ProjectDocument = z.infer<typeof ProjectDocumentSchema>;
