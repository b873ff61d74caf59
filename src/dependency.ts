import { z } from 'zod';

/** Absolute path inside the install root */
const TargetPath = z
  .string()
  .startsWith('/')
  .refine((p) => !p.split('/').includes('..'), 'Path must not contain ".." segments');

export const CopyRuleSchema = z.object({
  /** Path relative to the root of the extracted archive */
  source: z.string().min(1),
  /** Absolute destination path */
  target: TargetPath,
  /** Mark the destination as executable once copied */
  executable: z.boolean().optional(),
});

export const DependencySpecSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9._-]*$/, 'Dependency names must be lowercase alphanumeric'),
  version: z.string().min(1).optional(),
  sourceUrl: z.string().min(1),
  expectedHash: z.string().min(1).optional(),
  stripComponents: z.number().int().min(0).default(0),
  directories: z.array(TargetPath).default([]),
  markers: z.array(TargetPath).default([]),
  copyRules: z.array(CopyRuleSchema).min(1),
});

export const DependencyFileSchema = z.object({
  dependencies: z.array(DependencySpecSchema).min(1),
});

export type CopyRule = Readonly<z.infer<typeof CopyRuleSchema>>;

export interface DependencySpec {
  readonly name: string;
  readonly version?: string;
  readonly sourceUrl: string;
  readonly expectedHash?: string;
  readonly stripComponents: number;
  readonly directories: readonly string[];
  readonly markers: readonly string[];
  readonly copyRules: readonly CopyRule[];
}
