/**
 * Registry entities, deletion criteria and run outcomes.
 *
 * Copyright (C) 2025 Paulo Ferreira de Castro
 *
 * Licensed under the Open Software License version 3.0, a copy of which can be
 * found in the LICENSE file.
 */

export interface Namespace {
    id: string;
    name: string;
}

export interface Image {
    id: string;
    name: string;
    namespaceId: string;
}

export interface Tag {
    id: string;
    name: string;
    imageId: string;
    imageName: string;
    namespaceId: string;
    createdAt: Date;
    updatedAt: Date;
}

export interface Criteria {
    readonly deleteOldTags: boolean;
    readonly ageThresholdDays: number;
    readonly namePattern?: RegExp;
    /** TAG_NAME_PATTERN as configured (trimmed), echoed back unescaped. */
    readonly namePatternSource?: string;
    readonly deleteUnusedNamespaces: boolean;
    readonly targetNamespaceId?: string;
    readonly targetImageId?: string;
    readonly dryRun: boolean;
}

export type DeletionReason = "old" | "name_match";

/** ‘planned’ is only produced by dry runs. */
export type OutcomeStatus = "deleted" | "error" | "planned";

export interface TagOutcome {
    type: "tag";
    tag_id: string;
    tag_name: string;
    image_name: string;
    status: OutcomeStatus;
    deletion_reasons: DeletionReason[];
    created_at: string;
    updated_at: string;
    error?: string;
}

export interface NamespaceOutcome {
    type: "namespace";
    namespace_id: string;
    namespace_name: string;
    status: OutcomeStatus;
    reason: "empty_namespace";
    error?: string;
}

/** An image or namespace whose contents could not be listed. */
export interface FetchOutcome {
    type: "fetch";
    scope: "namespace" | "image";
    id: string;
    name: string;
    status: "error";
    error: string;
}

export type Outcome = TagOutcome | NamespaceOutcome | FetchOutcome;

export interface CriteriaEcho {
    delete_old_tags: boolean;
    age_threshold_days: number;
    tag_name_pattern: string | null;
    delete_unused_namespaces: boolean;
    target_namespace_id: string | null;
    target_image_id: string | null;
    dry_run: boolean;
}

export interface Summary {
    total_images_analyzed: number;
    total_tags_found: number;
    total_tags_selected: number;
    successfully_deleted: number;
    planned: number;
    errors: number;
    fetch_errors: number;
    namespaces_deleted: number;
    namespace_errors: number;
    criteria_used: CriteriaEcho | null;
}

export interface PurgeBody {
    message: Outcome[];
    summary: Summary;
}

export interface ErrorBody {
    error: string;
    error_type: string;
    summary: Summary;
}

export interface PurgeResponse {
    body: PurgeBody | ErrorBody;
    statusCode: number;
}
