// ============================================================================
// Feed Image Cache — Validation Schemas
// ============================================================================

import { z } from "zod";
import type { FeedImageCacheRow, FeedImageRecord } from "./types.js";

export const feedImageRecordSchema = z.object({
    id: z.string().uuid(),
    description: z.string().nullable(),
    location: z.string().nullable(),
    url: z.string().url(),
}) satisfies z.ZodType<FeedImageRecord>;

export const feedImageCacheRowSchema = z.object({
    id: z.string().uuid(),
    description: z.string().nullable(),
    location: z.string().nullable(),
    url: z.string().url(),
    timestamp: z.number(),
}) satisfies z.ZodType<FeedImageCacheRow>;

export const insertInputSchema = z.object({
    items: z.array(feedImageRecordSchema),
    timestamp: z.date(),
});

/** Flatten zod issues into "path: message" strings for error context. */
export function describeIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const where = issue.path.join(".");
        return where ? `${where}: ${issue.message}` : issue.message;
    });
}
