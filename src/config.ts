/**
 * Resolve the purge criteria from an environment-style mapping.
 *
 * Copyright (C) 2025 Paulo Ferreira de Castro
 *
 * Licensed under the Open Software License version 3.0, a copy of which can be
 * found in the LICENSE file.
 */

import { ConfigurationError } from "./errors.js";
import type { Criteria, CriteriaEcho } from "./types.js";
import { type EnvMap, boolVar, errorMessage, strVar } from "./util.js";

export const AGE_THRESHOLD_DAYS = 90;

/** Configuration keys read by resolveCriteria(). */
export const CRITERIA_KEYS = {
    deleteOldTags: "DELETE_OLD_TAGS",
    namePattern: "TAG_NAME_PATTERN",
    deleteUnusedNamespaces: "DELETE_UNUSED_NAMESPACE",
    targetNamespaceId: "NAMESPACE_ID",
    targetImageId: "IMAGE_ID",
    dryRun: "DRY_RUN",
} as const;

export function compilePattern(source: string): RegExp {
    try {
        // No ‘g’ flag: RegExp.test() must not carry lastIndex between tags.
        return new RegExp(source);
    } catch (err) {
        throw new ConfigurationError(
            `Invalid ${CRITERIA_KEYS.namePattern} regular expression '${source}': ${errorMessage(err)}`,
        );
    }
}

export function resolveCriteria(env: EnvMap, overrides?: { dryRun?: boolean }): Criteria {
    const K = CRITERIA_KEYS;
    const pattern = strVar(env, K.namePattern);
    const criteria: Criteria = {
        deleteOldTags: boolVar(env, K.deleteOldTags, true),
        ageThresholdDays: AGE_THRESHOLD_DAYS,
        namePattern: pattern === undefined ? undefined : compilePattern(pattern),
        namePatternSource: pattern,
        deleteUnusedNamespaces: boolVar(env, K.deleteUnusedNamespaces, false),
        targetNamespaceId: strVar(env, K.targetNamespaceId),
        targetImageId: strVar(env, K.targetImageId),
        dryRun: overrides?.dryRun ?? boolVar(env, K.dryRun, false),
    };
    return Object.freeze(criteria);
}

// RegExp.source escapes ‘/’ and line terminators; prefer the configured text.
function patternSource(criteria: Criteria): string | undefined {
    return criteria.namePatternSource ?? criteria.namePattern?.source;
}

export function echoCriteria(criteria: Criteria): CriteriaEcho {
    return {
        delete_old_tags: criteria.deleteOldTags,
        age_threshold_days: criteria.ageThresholdDays,
        tag_name_pattern: patternSource(criteria) ?? null,
        delete_unused_namespaces: criteria.deleteUnusedNamespaces,
        target_namespace_id: criteria.targetNamespaceId ?? null,
        target_image_id: criteria.targetImageId ?? null,
        dry_run: criteria.dryRun,
    };
}

/** Human readable list of the active criteria, for logging. */
export function describeCriteria(criteria: Criteria): string {
    const active: string[] = [];
    if (criteria.deleteOldTags) {
        active.push(`old tags (>${criteria.ageThresholdDays} days)`);
    }
    const source = patternSource(criteria);
    if (source !== undefined) {
        active.push(`tags matching pattern '${source}'`);
    }
    if (criteria.deleteUnusedNamespaces) {
        active.push("empty namespaces");
    }
    if (criteria.targetImageId) {
        active.push(`target image: ${criteria.targetImageId}`);
    } else if (criteria.targetNamespaceId) {
        active.push(`target namespace: ${criteria.targetNamespaceId}`);
    }
    if (criteria.dryRun) {
        active.push("dry run");
    }
    return active.length ? active.join(", ") : "none";
}
