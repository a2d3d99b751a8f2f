/**
 * Request schemas for the property API.
 */

import { z } from "zod";
import { PUBLISHED_ARCHIVES } from "./config";

// ---------------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------------

export const searchQuerySchema = z.object({
    q: z.string().optional(),
    limit: z.coerce
        .number()
        .int("Limit must be a whole number")
        .positive("Limit must be positive")
        .optional(),
});

export type SearchQuery = z.infer<typeof searchQuerySchema>;

// ---------------------------------------------------------------------------------
// Claim
// ---------------------------------------------------------------------------------

export const claimRequestSchema = z.object({
    propertyId: z.string().trim().min(1, "Property ID is required"),
    claimantName: z.string().trim().min(1, "Claimant name is required"),
    claimantAddress: z.string().trim().min(1, "Claimant address is required"),
    claimantEmail: z.string().trim().email("Claimant email must be valid"),
    claimantPhone: z.string().trim().optional(),
});

// ---------------------------------------------------------------------------------
// Ingest
// ---------------------------------------------------------------------------------

export const ingestRequestSchema = z.object({
    // Only published archive names; paths and URLs are for the CLI
    locations: z
        .array(
            z.enum(PUBLISHED_ARCHIVES, {
                errorMap: () => ({
                    message: `Location must be one of: ${PUBLISHED_ARCHIVES.join(", ")}`,
                }),
            }),
        )
        .min(1, "At least one location is required")
        .optional(),
});

export type IngestRequest = z.infer<typeof ingestRequestSchema>;
