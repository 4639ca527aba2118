/**
 * MigrationPlan schema.
 *
 * Plans are YAML documents describing, per file, the lines to strip, the
 * list entries to ensure and the blocks to insert; per directory, the merges
 * to perform; plus the expectations that confirm the end state.
 */

import { z } from 'zod';

const RelativePath = z.string().min(1, 'path must not be empty');
const Pattern = z.string().min(1, 'patterns must not be empty');

const ONE_SOURCE = { message: 'exactly one of "content" or "template" is required' };

function hasOneSource(value: { content?: string; template?: string }): boolean {
  return (value.content === undefined) !== (value.template === undefined);
}

/** Inline content or a template file resolved next to the plan */
const ContentSource = z
  .object({
    content: z.string().optional(),
    template: z.string().min(1).optional(),
  })
  .refine(hasOneSource, ONE_SOURCE);

const InsertSchema = z
  .object({
    marker: z.string().min(1).optional(),
    content: z.string().optional(),
    template: z.string().min(1).optional(),
  })
  .refine(hasOneSource, ONE_SOURCE);

const ListEditSchema = z.object({
  block: z.string().min(1),
  close: z.string().min(1).default(']'),
  indent: z.string().optional(),
  add: z.array(z.string().min(1)).default([]),
  remove: z.array(Pattern).default([]),
});

const FileEditSchema = z.object({
  path: RelativePath,
  required: z.boolean().default(false),
  remove: z.array(Pattern).default([]),
  retract: z.array(ContentSource).default([]),
  lists: z.array(ListEditSchema).default([]),
  insert: z.array(InsertSchema).default([]),
});

const CreateSchema = z
  .object({
    path: RelativePath,
    content: z.string().optional(),
    template: z.string().min(1).optional(),
  })
  .refine(hasOneSource, ONE_SOURCE);

const MergeSchema = z.object({
  from: RelativePath,
  to: RelativePath,
  /** Empty ancestors of `from` are removed up to this directory */
  pruneBoundary: RelativePath.optional(),
});

const RemoveMatchingSchema = z.object({
  dir: RelativePath,
  nameContains: Pattern,
});

const MarkerExpectationSchema = z.object({
  file: RelativePath,
  contains: z.array(Pattern).min(1),
});

export const ExpectationsSchema = z.object({
  directories: z.array(RelativePath).default([]),
  files: z.array(RelativePath).default([]),
  markers: z.array(MarkerExpectationSchema).default([]),
  entries: z
    .array(
      z.object({
        file: RelativePath,
        block: z.string().min(1),
        close: z.string().min(1).optional(),
        entries: z.array(z.string().min(1)).min(1),
      })
    )
    .default([]),
  absent: z.array(RelativePath).default([]),
  absentMarkers: z.array(MarkerExpectationSchema).default([]),
});

export const MigrationPlanSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  merges: z.array(MergeSchema).default([]),
  remove: z.array(RelativePath).default([]),
  removeMatching: z.array(RemoveMatchingSchema).default([]),
  purge: z.array(z.string().min(1)).default([]),
  ensureDirs: z.array(RelativePath).default([]),
  create: z.array(CreateSchema).default([]),
  files: z.array(FileEditSchema).default([]),
  gitignore: z.array(z.string().min(1)).default([]),
  expect: ExpectationsSchema.optional(),
});

/** Plan as written in YAML (defaults not yet applied) */
export type MigrationPlanInput = z.input<typeof MigrationPlanSchema>;
/** Validated plan with defaults applied */
export type MigrationPlan = z.output<typeof MigrationPlanSchema>;
export type FileEdit = MigrationPlan['files'][number];
export type ListEdit = FileEdit['lists'][number];
export type InsertSpec = FileEdit['insert'][number];
export type ContentSpec = FileEdit['retract'][number];
export type CreateSpec = MigrationPlan['create'][number];
export type MergeSpec = MigrationPlan['merges'][number];
export type Expectations = z.output<typeof ExpectationsSchema>;
