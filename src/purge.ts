/**
 * Purge tags and empty namespaces from the registry.
 *
 * A run evaluates every tag in scope, deletes the selected ones one at a time,
 * then optionally deletes the namespaces that were left empty. A failure to
 * delete or inspect a single tag, image or namespace is recorded as an ‘error’
 * outcome and the run carries on; only a failure to fetch the top-level scope
 * aborts it.
 *
 * Copyright (C) 2025 Paulo Ferreira de Castro
 *
 * Licensed under the Open Software License version 3.0, a copy of which can be
 * found in the LICENSE file.
 */

import { describeCriteria } from "./config.js";
import { evaluateTag } from "./evaluator.js";
import { type FailureItem, type Inventory, enumerateInventory, scopeOf } from "./inventory.js";
import type { RegistryClient } from "./registry.js";
import { aggregate } from "./report.js";
import type {
    Criteria,
    DeletionReason,
    Namespace,
    NamespaceOutcome,
    Outcome,
    PurgeBody,
    Tag,
    TagOutcome,
} from "./types.js";
import { errorMessage, getLogger } from "./util.js";

const log = () => getLogger();

export interface TagSelection {
    kind: "tag";
    tag: Tag;
    reasons: DeletionReason[];
}

export interface Plan {
    /** Selected tags and fetch failures, in enumeration order. */
    steps: (TagSelection | FailureItem)[];
    totalTags: number;
}

/** Evaluate every listed tag of the inventory. */
export function planTagDeletions(inventory: Inventory, criteria: Criteria, now: Date): Plan {
    const steps: Plan["steps"] = [];
    let totalTags = 0;
    for (const item of inventory.items) {
        if (item.kind === "failure") {
            steps.push(item);
            continue;
        }
        for (const tag of item.tags) {
            totalTags++;
            const reasons = evaluateTag(tag, criteria, now);
            if (reasons.length) {
                steps.push({ kind: "tag", tag, reasons });
            }
        }
    }
    return { steps, totalTags };
}

function tagOutcome(selection: TagSelection, status: TagOutcome["status"]): TagOutcome {
    const { tag, reasons } = selection;
    return {
        type: "tag",
        tag_id: tag.id,
        tag_name: tag.name,
        image_name: tag.imageName,
        status,
        deletion_reasons: [...reasons],
        created_at: tag.createdAt.toISOString(),
        updated_at: tag.updatedAt.toISOString(),
    };
}

/**
 * Delete a selected tag. Never throws: a failed deletion yields an outcome of
 * status ‘error’.
 */
export async function deleteTag(
    client: RegistryClient,
    selection: TagSelection,
    opts: { dryRun: boolean },
): Promise<TagOutcome> {
    const { tag, reasons } = selection;
    const label = `${tag.imageName}:${tag.name} (ID: ${tag.id})`;
    if (opts.dryRun) {
        log().info("Would delete tag %s for reasons: %s", label, reasons.join(", "));
        return tagOutcome(selection, "planned");
    }
    try {
        await client.deleteTag(tag.id);
    } catch (err) {
        const error = errorMessage(err);
        log().warn("Error deleting tag %s: %s", label, error);
        return { ...tagOutcome(selection, "error"), error };
    }
    log().info("Deleted tag %s for reasons: %s", label, reasons.join(", "));
    return tagOutcome(selection, "deleted");
}

/** Execute the plan sequentially, in order. */
export async function deleteSelectedTags(
    client: RegistryClient,
    plan: Plan,
    opts: { dryRun: boolean },
): Promise<Outcome[]> {
    const outcomes: Outcome[] = [];
    for (const step of plan.steps) {
        if (step.kind === "failure") {
            outcomes.push(step.outcome);
        } else {
            outcomes.push(await deleteTag(client, step, opts));
        }
    }
    return outcomes;
}

function namespaceOutcome(
    namespace: Namespace,
    status: NamespaceOutcome["status"],
    error?: string,
): NamespaceOutcome {
    const outcome: NamespaceOutcome = {
        type: "namespace",
        namespace_id: namespace.id,
        namespace_name: namespace.name,
        status,
        reason: "empty_namespace",
    };
    if (error !== undefined) {
        outcome.error = error;
    }
    return outcome;
}

/**
 * Count, per namespace ID, the listed images whose tags are all selected.
 *
 * Nothing is deleted in a dry run, so these images are still in the live image
 * count. The projection assumes the registry drops an image along with its
 * last tag.
 */
export function countEmptiedImages(inventory: Inventory, plan: Plan): Map<string, number> {
    const selected = new Set<string>();
    for (const step of plan.steps) {
        if (step.kind === "tag") {
            selected.add(step.tag.id);
        }
    }
    const counts = new Map<string, number>();
    for (const item of inventory.items) {
        if (
            item.kind === "image" &&
            item.tags.length > 0 &&
            item.tags.every((tag) => selected.has(tag.id))
        ) {
            const { namespaceId } = item.image;
            counts.set(namespaceId, (counts.get(namespaceId) ?? 0) + 1);
        }
    }
    return counts;
}

/**
 * Delete the given namespaces that no longer contain any image.
 *
 * The image count is fetched again from the registry, after the tag deletions.
 * In a dry run, the images in ‘opts.emptiedImages’ are subtracted from it. A
 * namespace that still holds images produces no outcome.
 */
export async function cleanupNamespaces(
    client: RegistryClient,
    namespaces: Namespace[],
    opts: { dryRun: boolean; emptiedImages?: ReadonlyMap<string, number> },
): Promise<NamespaceOutcome[]> {
    const outcomes: NamespaceOutcome[] = [];
    log().info("Checking %d namespaces for emptiness", namespaces.length);
    for (const namespace of namespaces) {
        const label = `${namespace.name} (ID: ${namespace.id})`;
        let imageCount: number;
        try {
            imageCount = await client.getNamespaceImageCount(namespace.id);
        } catch (err) {
            const error = errorMessage(err);
            log().warn("Error checking namespace %s: %s", label, error);
            outcomes.push(namespaceOutcome(namespace, "error", error));
            continue;
        }
        if (opts.dryRun) {
            imageCount -= opts.emptiedImages?.get(namespace.id) ?? 0;
        }
        if (imageCount > 0) {
            log().debug("Keeping namespace %s: %d images left", label, imageCount);
            continue;
        }
        if (opts.dryRun) {
            log().info("Would delete empty namespace %s", label);
            outcomes.push(namespaceOutcome(namespace, "planned"));
            continue;
        }
        try {
            await client.deleteNamespace(namespace.id);
        } catch (err) {
            const error = errorMessage(err);
            log().warn("Error deleting namespace %s: %s", label, error);
            outcomes.push(namespaceOutcome(namespace, "error", error));
            continue;
        }
        log().info("Deleted empty namespace %s", label);
        outcomes.push(namespaceOutcome(namespace, "deleted"));
    }
    return outcomes;
}

/**
 * Run a complete purge pass.
 *
 * @param opts.now Reference time for the age criterion, defaults to the current time.
 * @throws EnumerationError if the top-level scope cannot be fetched.
 */
export async function runPurge(opts: {
    client: RegistryClient;
    criteria: Criteria;
    now?: Date;
}): Promise<PurgeBody> {
    const { client, criteria, now = new Date() } = opts;
    const { dryRun } = criteria;
    log().info("Active deletion criteria: %s", describeCriteria(criteria));
    if (!criteria.deleteOldTags && !criteria.namePattern) {
        log().warn("No tag deletion criterion is active: no tag will be selected");
    }
    log().debug("Enumeration scope: %s", scopeOf(criteria));

    const inventory = await enumerateInventory(client, criteria);
    const plan = planTagDeletions(inventory, criteria, now);
    const selected = plan.steps.filter((step) => step.kind === "tag").length;
    log().info("Found %d tags, %d selected for deletion", plan.totalTags, selected);

    const outcomes = await deleteSelectedTags(client, plan, { dryRun });
    if (criteria.deleteUnusedNamespaces) {
        const emptiedImages = countEmptiedImages(inventory, plan);
        outcomes.push(
            ...(await cleanupNamespaces(client, inventory.namespaces, { dryRun, emptiedImages })),
        );
    }

    const body = aggregate({
        criteria,
        imagesAnalyzed: inventory.images.length,
        tagsFound: plan.totalTags,
        outcomes,
    });
    const { summary } = body;
    log().info(
        "Done: %d tags deleted, %d tag errors, %d namespaces deleted, %d namespace errors",
        summary.successfully_deleted,
        summary.errors,
        summary.namespaces_deleted,
        summary.namespace_errors,
    );
    return body;
}
