import { z } from 'zod';

export const MemoryItemTypeSchema = z.enum(['run_metadata', 'tool_output', 'final_answer', 'note']);

// Field order here is the on-disk key order of every session log line.
export const MemoryItemSchema = z.object({
  timestamp: z.number(),
  type: MemoryItemTypeSchema,
  text: z.string(),
  session_id: z.string(),
  tags: z.array(z.string()).default([]),
  tool_name: z.string().optional(),
  tool_args: z.record(z.unknown()).optional(),
  tool_result: z.unknown().optional(),
  success: z.boolean().optional(),
  user_query: z.string().optional(),
  metadata: z.record(z.unknown()).default({}),
});

export type MemoryItemType = z.infer<typeof MemoryItemTypeSchema>;
export type MemoryItem = z.infer<typeof MemoryItemSchema>;
export type MemoryItemInput = z.input<typeof MemoryItemSchema>;

export const RUN_START_TAG = 'run_start';

export const IndexEntrySchema = z.object({
  user_query: z.string(),
  final_answer: z.string(),
  source_file: z.string(),
  timestamp: z.number(),
});

export type IndexEntry = z.infer<typeof IndexEntrySchema>;

export interface SearchHit {
  entry: IndexEntry;
  distance: number;
}

/** One canonical JSON line, without the trailing newline. */
export function serializeMemoryItem(item: MemoryItemInput): string {
  return JSON.stringify(MemoryItemSchema.parse(item));
}
