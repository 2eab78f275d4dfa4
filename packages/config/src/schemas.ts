import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const withId = (schema: ReturnType<typeof zodToJsonSchema>, id: string) =>
  Object.assign(schema, { $id: id });

export const FilterTypeSchema = z.enum(['all', 'mine']);

// Copy shown when the active filter yields no threads
export const EmptyStateCopySchema = z.object({
  title: z.string().min(1),
  infoAll: z.string().min(1),
  infoMine: z.string().min(1),
  tip: z.string(),
  showAllThreadsButtonTitle: z.string().min(1),
});

export const ThreadListConfigSchema = z.object({
  defaultFilter: FilterTypeSchema,
  emptyState: EmptyStateCopySchema,
});

/** Shape accepted from config files: every field optional, merged over defaults */
export const ThreadListConfigFileSchema = z.object({
  defaultFilter: FilterTypeSchema.optional(),
  emptyState: EmptyStateCopySchema.partial().optional(),
}).strict();

export type FilterTypeConfig = z.infer<typeof FilterTypeSchema>;
export type EmptyStateCopy = z.infer<typeof EmptyStateCopySchema>;
export type ThreadListConfig = z.infer<typeof ThreadListConfigSchema>;
export type ThreadListConfigInput = z.infer<typeof ThreadListConfigFileSchema>;

export const jsonSchemas = {
  threadList: withId(zodToJsonSchema(ThreadListConfigFileSchema, { target: 'jsonSchema7' }), 'ThreadListConfig'),
};
