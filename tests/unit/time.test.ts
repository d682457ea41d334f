import { describe, it, expect } from "vitest";
import { fromReferenceSeconds, toReferenceSeconds } from "../../src/time.js";

describe("reference-epoch timestamps", () => {
    it("should count seconds from 2001-01-01T00:00:00Z", () => {
        expect(toReferenceSeconds(new Date("2001-01-01T00:00:00.000Z"))).toBe(0);
        expect(toReferenceSeconds(new Date("2001-01-01T00:16:40.000Z"))).toBe(1000);
        expect(toReferenceSeconds(new Date("2000-12-31T23:59:59.000Z"))).toBe(-1);
    });

    it("should convert seconds back to dates", () => {
        expect(fromReferenceSeconds(1000).toISOString()).toBe("2001-01-01T00:16:40.000Z");
        expect(fromReferenceSeconds(0.25).toISOString()).toBe("2001-01-01T00:00:00.250Z");
    });

    it("should keep millisecond precision through a round trip", () => {
        for (const iso of ["2024-05-06T07:08:09.123Z", "1999-12-31T23:59:59.999Z", "2038-01-19T03:14:07.001Z"]) {
            const date = new Date(iso);
            expect(fromReferenceSeconds(toReferenceSeconds(date)).getTime()).toBe(date.getTime());
        }
    });
});
