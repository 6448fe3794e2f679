/**
 * Decide whether a tag qualifies for deletion.
 *
 * Copyright (C) 2025 Paulo Ferreira de Castro
 *
 * Licensed under the Open Software License version 3.0, a copy of which can be
 * found in the LICENSE file.
 */

import type { Criteria, DeletionReason, Tag } from "./types.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * True if the tag was created more than ‘thresholdDays’ before ‘now’.
 * The update time is ignored: re-pushing a tag does not make it younger.
 */
export function isTagOld(tag: Pick<Tag, "createdAt">, thresholdDays: number, now: Date) {
    return now.getTime() - tag.createdAt.getTime() > thresholdDays * DAY_MS;
}

/**
 * Regular expression test of the tag name. The pattern is not implicitly
 * anchored: ‘dev-’ matches ‘my-dev-build’, ‘^dev-’ does not.
 */
export function matchesNamePattern(tag: Pick<Tag, "name">, pattern: RegExp): boolean {
    return pattern.test(tag.name);
}

/**
 * Return the reasons for deleting ‘tag’ under ‘criteria’, in a fixed order
 * (‘old’ before ‘name_match’). An empty array means the tag is kept.
 */
export function evaluateTag(tag: Tag, criteria: Criteria, now: Date): DeletionReason[] {
    const reasons: DeletionReason[] = [];
    if (criteria.deleteOldTags && isTagOld(tag, criteria.ageThresholdDays, now)) {
        reasons.push("old");
    }
    if (criteria.namePattern && matchesNamePattern(tag, criteria.namePattern)) {
        reasons.push("name_match");
    }
    return reasons;
}
