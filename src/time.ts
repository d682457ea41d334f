// ============================================================================
// Feed Image Cache — Reference-Epoch Timestamps
// ============================================================================

import { REFERENCE_EPOCH_MS } from "./constants.js";

export function toReferenceSeconds(date: Date): number {
    return (date.getTime() - REFERENCE_EPOCH_MS) / 1000;
}

// Rounded to whole milliseconds: seconds * 1000 may come back a fraction short.
export function fromReferenceSeconds(seconds: number): Date {
    return new Date(Math.round(seconds * 1000) + REFERENCE_EPOCH_MS);
}
