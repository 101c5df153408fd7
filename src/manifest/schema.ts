import { z } from "zod";

/**
 * Regex pattern for valid template IDs (lowercase, alphanumeric with hyphens)
 */
const ID_PATTERN = /^[a-z][a-z0-9-]*$/;

/**
 * Placeholder name as it may appear inside @[ ]@
 */
const PlaceholderNameSchema = z
  .string()
  .min(1, "Placeholder name cannot be empty")
  .refine((name) => !name.includes("]"), "Placeholder name cannot contain ']'");

/**
 * Schema for one template entry in an assembly manifest
 */
export const ManifestTemplateSchema = z
  .object({
    /** Unique identifier, referenced from other entries' refs */
    id: z
      .string()
      .regex(ID_PATTERN, "ID must start with lowercase letter and contain only lowercase letters, numbers, and hyphens"),

    /** Template file, relative to the manifest */
    file: z.string().min(1).optional(),

    /** Inline template content */
    content: z.string().optional(),

    /** Dependency declarations handed to the script runner */
    dependencies: z.array(z.string().min(1)).default([]),

    /** Literal placeholder values */
    values: z.record(PlaceholderNameSchema, z.string()).default({}),

    /** Placeholder -> id of the template whose render fills it */
    refs: z.record(PlaceholderNameSchema, z.string().regex(ID_PATTERN)).default({}),

    /** Include this template in the assembled output */
    emit: z.boolean().default(true),
  })
  .refine((entry) => (entry.file === undefined) !== (entry.content === undefined), {
    message: "Exactly one of 'file' or 'content' is required",
  });

/**
 * Schema for an assembly manifest
 */
export const ManifestSchema = z.object({
  /** Values broadcast to every template that declares the placeholder */
  globals: z.record(PlaceholderNameSchema, z.string()).default({}),

  templates: z.array(ManifestTemplateSchema).min(1, "Manifest must declare at least one template"),
});

// Inferred types
export type ManifestTemplate = z.infer<typeof ManifestTemplateSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;
export type ManifestInput = z.input<typeof ManifestSchema>;
