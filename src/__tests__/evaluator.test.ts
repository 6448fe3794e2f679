import { describe, expect, it } from "vitest";

import { evaluateTag, isTagOld } from "../evaluator.js";
import type { Tag } from "../types.js";
import { NOW, daysAgo, makeCriteria } from "./helpers.js";

function makeTag(name: string, createdAt: Date, updatedAt = createdAt): Tag {
    return {
        id: `tag-${name}`,
        name,
        imageId: "img-1",
        imageName: "app",
        namespaceId: "ns-1",
        createdAt,
        updatedAt,
    };
}

describe("isTagOld", () => {
    it("is false one second short of the threshold", () => {
        expect(isTagOld(makeTag("a", daysAgo(90, 1000)), 90, NOW)).toBe(false);
    });

    it("is true one second past the threshold", () => {
        expect(isTagOld(makeTag("a", daysAgo(90, -1000)), 90, NOW)).toBe(true);
    });

    it("is false exactly at the threshold", () => {
        expect(isTagOld(makeTag("a", daysAgo(90)), 90, NOW)).toBe(false);
    });
});

describe("evaluateTag", () => {
    it("selects old tags by creation time, ignoring a recent update", () => {
        const tag = makeTag("v1", daysAgo(100), daysAgo(1));
        expect(evaluateTag(tag, makeCriteria(), NOW)).toEqual(["old"]);
    });

    it("keeps recent tags", () => {
        expect(evaluateTag(makeTag("v2", daysAgo(10)), makeCriteria(), NOW)).toEqual([]);
    });

    it("selects name matches when the age criterion is off", () => {
        const criteria = makeCriteria({ deleteOldTags: false, namePattern: /^dev-.*/ });
        expect(evaluateTag(makeTag("dev-build", daysAgo(1)), criteria, NOW)).toEqual([
            "name_match",
        ]);
        expect(evaluateTag(makeTag("release-1", daysAgo(1)), criteria, NOW)).toEqual([]);
    });

    it("does not anchor the pattern implicitly", () => {
        const criteria = makeCriteria({ deleteOldTags: false, namePattern: /dev-/ });
        expect(evaluateTag(makeTag("my-dev-build", daysAgo(1)), criteria, NOW)).toEqual([
            "name_match",
        ]);
    });

    it("reports both reasons for an old matching tag", () => {
        const criteria = makeCriteria({ namePattern: /^dev-/ });
        expect(evaluateTag(makeTag("dev-old", daysAgo(200)), criteria, NOW)).toEqual([
            "old",
            "name_match",
        ]);
    });

    it("selects nothing when no criterion is active", () => {
        const criteria = makeCriteria({ deleteOldTags: false });
        for (const tag of [makeTag("dev-x", daysAgo(500)), makeTag("latest", daysAgo(0))]) {
            expect(evaluateTag(tag, criteria, NOW)).toEqual([]);
        }
    });

    it("gives the same answer for repeated evaluations of one pattern", () => {
        const criteria = makeCriteria({ deleteOldTags: false, namePattern: /^dev-/ });
        const tag = makeTag("dev-1", daysAgo(1));
        expect(evaluateTag(tag, criteria, NOW)).toEqual(["name_match"]);
        expect(evaluateTag(tag, criteria, NOW)).toEqual(["name_match"]);
    });
});
