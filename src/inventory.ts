/**
 * Enumerate the images and tags within the scope of a purge run.
 *
 * Copyright (C) 2025 Paulo Ferreira de Castro
 *
 * Licensed under the Open Software License version 3.0, a copy of which can be
 * found in the LICENSE file.
 */

import { EnumerationError, type EnumerationScope } from "./errors.js";
import type { RegistryClient } from "./registry.js";
import type { Criteria, FetchOutcome, Image, Namespace, Tag } from "./types.js";
import { errorMessage, getLogger } from "./util.js";

const log = () => getLogger();

export interface ImageItem {
    kind: "image";
    image: Image;
    tags: Tag[];
}

export interface FailureItem {
    kind: "failure";
    outcome: FetchOutcome;
}

export type InventoryItem = ImageItem | FailureItem;

export interface Inventory {
    scope: EnumerationScope;
    /** Every image in scope, including those whose tags could not be listed. */
    images: Image[];
    /** Listed images and isolated fetch failures, in enumeration order. */
    items: InventoryItem[];
    /** Namespaces touched by the scope: the candidates for namespace cleanup. */
    namespaces: Namespace[];
}

export function scopeOf(criteria: Criteria): EnumerationScope {
    if (criteria.targetImageId) {
        return "image";
    }
    return criteria.targetNamespaceId ? "namespace" : "all";
}

/**
 * Enumerate the images and tags to be evaluated.
 *
 * The target image, if any, takes precedence over the target namespace, which
 * is then ignored altogether (not even checked against the image’s namespace).
 *
 * @throws EnumerationError if the top-level scope (all namespaces, the target
 *     namespace or the target image) cannot be fetched.
 */
export async function enumerateInventory(
    client: RegistryClient,
    criteria: Criteria,
): Promise<Inventory> {
    if (criteria.targetImageId) {
        return await enumerateImage(client, criteria.targetImageId, {
            withNamespace: criteria.deleteUnusedNamespaces,
        });
    }
    if (criteria.targetNamespaceId) {
        return await enumerateNamespace(client, criteria.targetNamespaceId);
    }
    const inventory = await enumerateAll(client);
    log().info(
        "Found %d images to analyze in %d namespaces",
        inventory.images.length,
        inventory.namespaces.length,
    );
    return inventory;
}

async function fetchScope<T>(
    scope: EnumerationScope,
    what: string,
    fetch: () => Promise<T>,
): Promise<T> {
    try {
        return await fetch();
    } catch (err) {
        throw new EnumerationError(`Cannot fetch ${what}: ${errorMessage(err)}`, scope, {
            cause: err,
        });
    }
}

async function enumerateImage(
    client: RegistryClient,
    imageId: string,
    opts: { withNamespace: boolean },
): Promise<Inventory> {
    const image = await fetchScope("image", `image ${imageId}`, () =>
        client.getImage(imageId),
    );
    log().info("Analyzing target image %s (ID: %s)", image.name, image.id);
    const items: InventoryItem[] = [await listImageTags(client, image)];
    const namespaces: Namespace[] = [];
    if (opts.withNamespace) {
        try {
            namespaces.push(await client.getNamespace(image.namespaceId));
        } catch (err) {
            items.push(fetchFailure("namespace", image.namespaceId, image.namespaceId, err));
        }
    }
    return { scope: "image", images: [image], items, namespaces };
}

async function enumerateNamespace(
    client: RegistryClient,
    namespaceId: string,
): Promise<Inventory> {
    const what = `namespace ${namespaceId}`;
    const namespace = await fetchScope("namespace", what, () =>
        client.getNamespace(namespaceId),
    );
    const images = await fetchScope("namespace", `images of ${what}`, () =>
        client.listImages(namespaceId),
    );
    log().info(
        "Found %d images to analyze in namespace %s (ID: %s)",
        images.length,
        namespace.name,
        namespace.id,
    );
    const items: InventoryItem[] = [];
    for (const image of images) {
        items.push(await listImageTags(client, image));
    }
    return { scope: "namespace", images, items, namespaces: [namespace] };
}

async function enumerateAll(client: RegistryClient): Promise<Inventory> {
    const namespaces = await fetchScope("all", "namespaces", () => client.listNamespaces());
    const images: Image[] = [];
    const items: InventoryItem[] = [];
    for (const namespace of namespaces) {
        let nsImages: Image[];
        try {
            nsImages = await client.listImages(namespace.id);
        } catch (err) {
            items.push(fetchFailure("namespace", namespace.id, namespace.name, err));
            continue;
        }
        for (const image of nsImages) {
            images.push(image);
            items.push(await listImageTags(client, image));
        }
    }
    return { scope: "all", images, items, namespaces };
}

async function listImageTags(client: RegistryClient, image: Image): Promise<InventoryItem> {
    try {
        const tags = await client.listTags(image.id);
        return {
            kind: "image",
            image,
            tags: tags.map((tag) => ({
                ...tag,
                imageName: image.name,
                namespaceId: image.namespaceId,
            })),
        };
    } catch (err) {
        return fetchFailure("image", image.id, image.name, err);
    }
}

function fetchFailure(
    scope: FetchOutcome["scope"],
    id: string,
    name: string,
    err: unknown,
): FailureItem {
    const error = errorMessage(err);
    log().warn("Error listing the contents of %s %s (ID: %s): %s", scope, name, id, error);
    return { kind: "failure", outcome: { type: "fetch", scope, id, name, status: "error", error } };
}
