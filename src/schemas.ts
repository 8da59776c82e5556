import * as path from "node:path";
import { z } from "zod";

export const CONFIG_TOP_LEVEL_KEY = "assetwright";

export const EncodingSchema = z.enum([
  "utf8",
  "utf-8",
  "utf16le",
  "ucs2",
  "ucs-2",
  "latin1",
  "binary",
  "ascii",
]);

export const SassFormatSchema = z.enum(["expanded", "compressed"]);

// Non-zero, and distinct from the failure status 1
export const ChangedExitCodeSchema = z.number().int().min(2).max(255);

/**
 * Output path templates may carry one `[hash]` token, in the file name only.
 */
export const OutputTemplateSchema = z
  .string()
  .min(1)
  .superRefine((value, ctx) => {
    const occurrences = value.split("[hash]").length - 1;
    if (occurrences > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Output path may contain at most one [hash] placeholder: ${value}`,
      });
    } else if (occurrences === 1 && !path.basename(value).includes("[hash]")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `The [hash] placeholder must be in the file name: ${value}`,
      });
    }
  });

export const FileMapSchema = z.record(z.string().min(1), OutputTemplateSchema);

export const SassSectionSchema = z
  .object({
    files: FileMapSchema.optional(),
    format: SassFormatSchema.optional(),
    sourcemap: z.boolean().optional(),
    encoding: EncodingSchema.optional(),
    load_paths: z.array(z.string()).optional(),
  })
  .strict();

export const JsSectionSchema = z
  .object({
    files: FileMapSchema.optional(),
    comments: z.boolean().optional(),
    encoding: EncodingSchema.optional(),
  })
  .strict();

export const TemplateSectionSchema = z
  .object({
    files: FileMapSchema.optional(),
    variables: z.record(z.string(), z.unknown()).optional(),
    encoding: EncodingSchema.optional(),
  })
  .strict();

/** Defaults for the path-driven `scss` command. */
export const ScssSectionSchema = z
  .object({
    recurse: z.boolean().optional(),
    partial_depth: z.number().int().min(0).optional(),
    stop_on_error: z.boolean().optional(),
    encoding: EncodingSchema.optional(),
    format: SassFormatSchema.optional(),
    sourcemap: z.boolean().optional(),
    hash_filenames: z.boolean().optional(),
    translate: z.record(z.string().min(1), z.string().min(1)).optional(),
    load_paths: z.array(z.string()).optional(),
    exit_code: ChangedExitCodeSchema.optional(),
    git_add: z.boolean().optional(),
  })
  .strict();

export const ConfigSchema = z
  .object({
    sass: SassSectionSchema.optional(),
    js: JsSectionSchema.optional(),
    template: TemplateSectionSchema.optional(),
    scss: ScssSectionSchema.optional(),
    git_add: z.boolean().optional(),
    continue_on_error: z.boolean().optional(),
    exit_code: ChangedExitCodeSchema.optional(),
    dry_run: z.boolean().optional(),
    quiet: z.boolean().optional(),
    verbose: z.boolean().optional(),
  })
  .strict();

export type Encoding = z.infer<typeof EncodingSchema>;
export type SassFormat = z.infer<typeof SassFormatSchema>;
export type FileMap = z.infer<typeof FileMapSchema>;
export type SassSection = z.infer<typeof SassSectionSchema>;
export type JsSection = z.infer<typeof JsSectionSchema>;
export type TemplateSection = z.infer<typeof TemplateSectionSchema>;
export type ScssSection = z.infer<typeof ScssSectionSchema>;
export type Config = z.infer<typeof ConfigSchema>;
