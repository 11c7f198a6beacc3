import { z } from 'zod/v4';

/**
 * Zod schema for a filter value. Values are compared as lowercased text,
 * so any JSON scalar is accepted.
 */
const filterValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Zod schema for a single query. Every clause is optional and all clauses
 * that are present must match. A null `name` or `filter` counts as absent.
 * Unknown keys are ignored.
 */
export const querySpecSchema = z.object({
  name: z.string().nullish(),
  filter: z.record(z.string(), filterValueSchema).nullish(),
  departure_between: z.tuple([z.string(), z.string()]).optional(),
  arrival_before: z.string().optional(),
  arrival_after: z.string().optional(),
});

/** Zod schema for a queries document: a JSON array of query objects. */
export const queriesFileSchema = z.array(querySpecSchema);

/** A scalar a filter compares against. */
export type FilterValue = z.infer<typeof filterValueSchema>;

/** Parsed type for one query. */
export type QuerySpec = z.infer<typeof querySpecSchema>;
