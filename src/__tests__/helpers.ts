import type { RegistryClient, RegistryTag } from "../registry.js";
import type { Criteria, Image, Namespace } from "../types.js";
import { DAY_MS } from "../evaluator.js";
import { getLogger } from "../util.js";

// Keep test output quiet: the first getLogger() call fixes the level.
getLogger({ level: "error" });

export const NOW = new Date("2025-06-01T12:00:00.000Z");

export function daysAgo(days: number, extraMs = 0): Date {
    return new Date(NOW.getTime() - days * DAY_MS + extraMs);
}

export function makeCriteria(overrides: Partial<Criteria> = {}): Criteria {
    return {
        deleteOldTags: true,
        ageThresholdDays: 90,
        deleteUnusedNamespaces: false,
        dryRun: false,
        ...overrides,
    };
}

export type FakeMethod = keyof RegistryClient;

/**
 * In-memory registry. This fake assumes that deleting the last tag of an image
 * also removes the image; namespace cleanup tests rely on that assumption.
 */
export class FakeRegistryClient implements RegistryClient {
    namespaces: Namespace[] = [];
    images: Image[] = [];
    tags: RegistryTag[] = [];
    calls: string[] = [];
    private failures = new Map<string, Error>();

    addNamespace(id: string, name = id): this {
        this.namespaces.push({ id, name });
        return this;
    }

    addImage(id: string, namespaceId: string, name = id): this {
        this.images.push({ id, name, namespaceId });
        return this;
    }

    addTag(id: string, imageId: string, name: string, createdAt: Date, updatedAt = createdAt): this {
        this.tags.push({ id, name, imageId, createdAt, updatedAt });
        return this;
    }

    /** Make ‘method’ reject when called with ‘id’ (or without argument). */
    failOn(method: FakeMethod, id = "", message = `${method} failed`): this {
        this.failures.set(`${method}:${id}`, new Error(message));
        return this;
    }

    private record(method: FakeMethod, id = "") {
        this.calls.push(id ? `${method}:${id}` : method);
        const err = this.failures.get(`${method}:${id}`);
        if (err) {
            throw err;
        }
    }

    async listNamespaces(): Promise<Namespace[]> {
        this.record("listNamespaces");
        return [...this.namespaces];
    }

    async getNamespace(namespaceId: string): Promise<Namespace> {
        this.record("getNamespace", namespaceId);
        const namespace = this.namespaces.find((ns) => ns.id === namespaceId);
        if (!namespace) {
            throw new Error(`namespace ${namespaceId} not found`);
        }
        return namespace;
    }

    async listImages(namespaceId?: string): Promise<Image[]> {
        this.record("listImages", namespaceId);
        return this.images.filter((img) => !namespaceId || img.namespaceId === namespaceId);
    }

    async getImage(imageId: string): Promise<Image> {
        this.record("getImage", imageId);
        const image = this.images.find((img) => img.id === imageId);
        if (!image) {
            throw new Error(`image ${imageId} not found`);
        }
        return image;
    }

    async listTags(imageId: string): Promise<RegistryTag[]> {
        this.record("listTags", imageId);
        return this.tags.filter((tag) => tag.imageId === imageId);
    }

    async deleteTag(tagId: string): Promise<void> {
        this.record("deleteTag", tagId);
        const tag = this.tags.find((t) => t.id === tagId);
        if (!tag) {
            throw new Error(`tag ${tagId} not found`);
        }
        this.tags = this.tags.filter((t) => t.id !== tagId);
        if (!this.tags.some((t) => t.imageId === tag.imageId)) {
            this.images = this.images.filter((img) => img.id !== tag.imageId);
        }
    }

    async deleteNamespace(namespaceId: string): Promise<void> {
        this.record("deleteNamespace", namespaceId);
        this.namespaces = this.namespaces.filter((ns) => ns.id !== namespaceId);
    }

    async getNamespaceImageCount(namespaceId: string): Promise<number> {
        this.record("getNamespaceImageCount", namespaceId);
        return this.images.filter((img) => img.namespaceId === namespaceId).length;
    }
}
