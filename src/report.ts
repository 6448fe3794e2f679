/**
 * Fold run outcomes into the response returned to the caller.
 *
 * Copyright (C) 2025 Paulo Ferreira de Castro
 *
 * Licensed under the Open Software License version 3.0, a copy of which can be
 * found in the LICENSE file.
 */

import { echoCriteria } from "./config.js";
import { ConfigurationError } from "./errors.js";
import type {
    Criteria,
    Outcome,
    PurgeBody,
    PurgeResponse,
    Summary,
} from "./types.js";
import { errorMessage } from "./util.js";

export function emptySummary(criteria?: Criteria): Summary {
    return {
        total_images_analyzed: 0,
        total_tags_found: 0,
        total_tags_selected: 0,
        successfully_deleted: 0,
        planned: 0,
        errors: 0,
        fetch_errors: 0,
        namespaces_deleted: 0,
        namespace_errors: 0,
        criteria_used: criteria ? echoCriteria(criteria) : null,
    };
}

/**
 * Build the response body. Outcomes are kept in the given order: tags (and
 * fetch failures) in enumeration order, then namespaces.
 */
export function aggregate(opts: {
    criteria: Criteria;
    imagesAnalyzed: number;
    tagsFound: number;
    outcomes: Outcome[];
}): PurgeBody {
    const { criteria, imagesAnalyzed, tagsFound, outcomes } = opts;
    const summary = emptySummary(criteria);
    summary.total_images_analyzed = imagesAnalyzed;
    summary.total_tags_found = tagsFound;
    for (const outcome of outcomes) {
        switch (outcome.type) {
            case "tag":
                summary.total_tags_selected++;
                if (outcome.status === "deleted") {
                    summary.successfully_deleted++;
                } else if (outcome.status === "error") {
                    summary.errors++;
                } else {
                    summary.planned++;
                }
                break;
            case "namespace":
                if (outcome.status === "deleted") {
                    summary.namespaces_deleted++;
                } else if (outcome.status === "error") {
                    summary.namespace_errors++;
                } else {
                    summary.planned++;
                }
                break;
            case "fetch":
                summary.fetch_errors++;
                break;
        }
    }
    return { message: [...outcomes], summary };
}

export function toResponse(body: PurgeBody): PurgeResponse {
    return { body, statusCode: 200 };
}

/**
 * Response for a run aborted by a fatal error: 400 for configuration errors,
 * 500 otherwise. No outcome list is returned.
 */
export function toErrorResponse(err: unknown, criteria?: Criteria): PurgeResponse {
    const summary = emptySummary(criteria);
    summary.errors = 1;
    const statusCode = err instanceof ConfigurationError ? 400 : 500;
    return {
        body: {
            error: errorMessage(err),
            error_type: err instanceof Error ? err.name : "Error",
            summary,
        },
        statusCode,
    };
}
