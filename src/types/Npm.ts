import { z } from 'zod';

/**
 * One entry under `dependencies` in `npm list --json`.
 * npm adds `missing` / `invalid` flags for packages declared in package.json
 * that are absent or do not satisfy the declared range.
 */
export const NpmListNodeSchema = z
    .object({
        version: z.string().optional(),
        missing: z.boolean().optional(),
        invalid: z.union([z.boolean(), z.string()]).optional(),
        required: z.unknown().optional()
    })
    .passthrough();

export type NpmListNode = z.infer<typeof NpmListNodeSchema>;

export const NpmListTreeSchema = z
    .object({
        name: z.string().optional(),
        version: z.string().optional(),
        dependencies: z.record(z.string(), NpmListNodeSchema).optional()
    })
    .passthrough();

export type NpmListTree = z.infer<typeof NpmListTreeSchema>;

/**
 * One value of the `npm outdated --json` object, keyed by package name.
 * `current` is absent when the package is not installed at all.
 */
export const NpmOutdatedInfoSchema = z
    .object({
        current: z.string().optional(),
        wanted: z.string().optional(),
        latest: z.string().optional(),
        location: z.string().optional(),
        dependent: z.string().optional()
    })
    .passthrough();

export type NpmOutdatedInfo = z.infer<typeof NpmOutdatedInfoSchema>;

/**
 * npm 7+ reports a package that appears in several workspaces as an array of entries.
 */
export const NpmOutdatedReportSchema = z.record(
    z.string(),
    z.union([NpmOutdatedInfoSchema, z.array(NpmOutdatedInfoSchema)])
);

export type NpmOutdatedReport = z.infer<typeof NpmOutdatedReportSchema>;

/**
 * npm prints `{ "error": { ... } }` instead of a report when the command itself fails.
 */
export const NpmErrorReportSchema = z
    .object({
        error: z
            .object({
                code: z.string().optional(),
                summary: z.string().optional(),
                detail: z.string().optional()
            })
            .passthrough()
            .refine((e) => e.code !== undefined || e.summary !== undefined)
    })
    .strict();
