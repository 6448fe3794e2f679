/**
 * Query and modify a Scaleway container registry through its management API.
 *
 * https://www.scaleway.com/en/developers/api/registry/
 *
 * Copyright (C) 2025 Paulo Ferreira de Castro
 *
 * Licensed under the Open Software License version 3.0, a copy of which can be
 * found in the LICENSE file.
 */

import { inspect } from "node:util";

import got, { RequestError } from "got";
import type { BeforeRequestHook, OptionsWithPagination, Response } from "got";
import pThrottle from "p-throttle";

import { ConfigurationError, RegistryError } from "./errors.js";
import { getCommonGotOpts } from "./got_wrappers.js";
import type { Image, Namespace, Tag } from "./types.js";
import { type EnvMap, boolVar, getLogger, strVar } from "./util.js";

const log = () => getLogger();

export const DEFAULT_API_URL = "https://api.scaleway.com";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const PAGE_SIZE = 100;

/** A tag as listed by the registry, before it is attributed to its image. */
export type RegistryTag = Omit<Tag, "imageName" | "namespaceId">;

/**
 * Remote registry operations consumed by the purge engine. Any method may
 * reject; the engine decides which failures are fatal.
 */
export interface RegistryClient {
    listNamespaces(): Promise<Namespace[]>;
    getNamespace(namespaceId: string): Promise<Namespace>;
    listImages(namespaceId?: string): Promise<Image[]>;
    getImage(imageId: string): Promise<Image>;
    listTags(imageId: string): Promise<RegistryTag[]>;
    deleteTag(tagId: string): Promise<void>;
    deleteNamespace(namespaceId: string): Promise<void>;
    getNamespaceImageCount(namespaceId: string): Promise<number>;
}

export interface ClientConfig {
    region: string;
    secretKey: string;
    apiUrl: string;
    timeoutMs: number;
    debug: boolean;
}

/** Configuration keys read by resolveClientConfig(). */
export const CLIENT_KEYS = {
    region: "REGION",
    secretKey: "SCW_SECRET_KEY",
    apiUrl: "SCW_API_URL",
    timeoutMs: "REQUEST_TIMEOUT_MS",
    debug: "DEBUG",
} as const;

export function resolveClientConfig(env: EnvMap): ClientConfig {
    const K = CLIENT_KEYS;
    const region = strVar(env, K.region);
    if (!region) {
        throw new ConfigurationError(`Missing required configuration key ${K.region}`);
    }
    const secretKey = strVar(env, K.secretKey);
    if (!secretKey) {
        throw new ConfigurationError(`Missing required configuration key ${K.secretKey}`);
    }
    const timeout = strVar(env, K.timeoutMs);
    const timeoutMs = timeout === undefined ? DEFAULT_TIMEOUT_MS : Number(timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
        throw new ConfigurationError(
            `${K.timeoutMs} must be a positive integer, got '${timeout}'`,
        );
    }
    return {
        region,
        secretKey,
        apiUrl: (strVar(env, K.apiUrl) ?? DEFAULT_API_URL).replace(/\/+$/, ""),
        timeoutMs,
        debug: boolVar(env, K.debug, false),
    };
}

/*
 * Response bodies of the registry API. Only the fields used here are declared.
 * Sample tag:
 * { id: '7ea3ad5e-...', name: 'dev-1234', image_id: 'c0a5...', status: 'ready',
 *   digest: 'sha256:5b1f...', created_at: '2025-04-02T09:11:05.123Z',
 *   updated_at: '2025-04-02T09:11:05.123Z' }
 */
interface NamespaceBody {
    id: string;
    name: string;
}

interface ImageBody {
    id: string;
    name: string;
    namespace_id: string;
}

interface TagBody {
    id: string;
    name: string;
    image_id: string;
    created_at: string;
    updated_at: string;
}

interface ListBody {
    total_count: number;
}

function isObject(body: unknown): body is Record<string, unknown> {
    return !!body && typeof body === "object" && !Array.isArray(body);
}

function hasStrings<K extends string>(
    body: unknown,
    keys: readonly K[],
): body is Record<K, string> {
    return isObject(body) && keys.every((key) => typeof body[key] === "string");
}

export function isNamespaceBody(body: unknown): body is NamespaceBody {
    return hasStrings(body, ["id", "name"]);
}

export function isImageBody(body: unknown): body is ImageBody {
    return hasStrings(body, ["id", "name", "namespace_id"]);
}

export function isTagBody(body: unknown): body is TagBody {
    return hasStrings(body, ["id", "name", "image_id", "created_at", "updated_at"]);
}

function isListBody(body: unknown): body is ListBody {
    return isObject(body) && typeof body.total_count === "number";
}

export function toNamespace(body: NamespaceBody): Namespace {
    return { id: body.id, name: body.name };
}

export function toImage(body: ImageBody): Image {
    return { id: body.id, name: body.name, namespaceId: body.namespace_id };
}

export function toRegistryTag(body: TagBody): RegistryTag {
    const createdAt = new Date(body.created_at);
    const updatedAt = new Date(body.updated_at);
    if (Number.isNaN(createdAt.getTime()) || Number.isNaN(updatedAt.getTime())) {
        throw new RegistryError(
            `Invalid timestamps for tag id='${body.id}': ` +
                `created_at='${body.created_at}' updated_at='${body.updated_at}'`,
        );
    }
    return { id: body.id, name: body.name, imageId: body.image_id, createdAt, updatedAt };
}

/**
 * Extract and validate the items of a list response page, e.g. the ‘tags’
 * array of ‘{ tags: [...], total_count: 3 }’.
 */
export function parseListPage<T>(
    body: unknown,
    key: string,
    isItem: (item: unknown) => item is T,
): T[] {
    const items = isObject(body) ? body[key] : undefined;
    if (!Array.isArray(items) || !items.every(isItem)) {
        throw new RegistryError(
            `Unexpected list response body for '${key}':\n` +
                `Response body: ${inspect(body, { depth: 5 })}`,
        );
    }
    return items;
}

export class ScalewayRegistryClient implements RegistryClient {
    private readonly config: ClientConfig;
    private readonly baseUrl: string;
    private readonly throttleHook: BeforeRequestHook;

    constructor(config: ClientConfig, opts?: { requestsPerSecond?: number }) {
        this.config = config;
        const { apiUrl, region } = config;
        this.baseUrl = `${apiUrl}/registry/v1/regions/${encodeURIComponent(region)}`;
        const throttle = pThrottle({
            limit: opts?.requestsPerSecond ?? 10,
            interval: 1000,
            strict: true,
        });
        const throttled = throttle(() => undefined);
        this.throttleHook = async () => {
            await throttled();
        };
    }

    async listNamespaces(): Promise<Namespace[]> {
        const bodies = await this.getAll("namespaces", "namespaces", isNamespaceBody, {
            order_by: "created_at_asc",
        });
        return bodies.map(toNamespace);
    }

    async getNamespace(namespaceId: string): Promise<Namespace> {
        const path = `namespaces/${encodeURIComponent(namespaceId)}`;
        const body = await this.getOne(path);
        if (!isNamespaceBody(body)) {
            throw this.invalidBody(path, body);
        }
        return toNamespace(body);
    }

    async listImages(namespaceId?: string): Promise<Image[]> {
        const searchParams: Record<string, string> = { order_by: "created_at_asc" };
        if (namespaceId) {
            searchParams.namespace_id = namespaceId;
        }
        const bodies = await this.getAll("images", "images", isImageBody, searchParams);
        return bodies.map(toImage);
    }

    async getImage(imageId: string): Promise<Image> {
        const path = `images/${encodeURIComponent(imageId)}`;
        const body = await this.getOne(path);
        if (!isImageBody(body)) {
            throw this.invalidBody(path, body);
        }
        return toImage(body);
    }

    async listTags(imageId: string): Promise<RegistryTag[]> {
        const path = `images/${encodeURIComponent(imageId)}/tags`;
        const bodies = await this.getAll(path, "tags", isTagBody, {
            order_by: "created_at_desc",
        });
        return bodies.map(toRegistryTag);
    }

    async deleteTag(tagId: string): Promise<void> {
        await this.request(`tags/${encodeURIComponent(tagId)}`, "DELETE");
    }

    async deleteNamespace(namespaceId: string): Promise<void> {
        await this.request(`namespaces/${encodeURIComponent(namespaceId)}`, "DELETE");
    }

    async getNamespaceImageCount(namespaceId: string): Promise<number> {
        const body = await this.request("images", "GET", {
            namespace_id: namespaceId,
            page_size: 1,
        });
        if (!isListBody(body)) {
            throw this.invalidBody("images", body);
        }
        return body.total_count;
    }

    private gotOpts(path: string, searchParams?: Record<string, string | number>) {
        const { secretKey, timeoutMs, debug } = this.config;
        return getCommonGotOpts({
            url: `${this.baseUrl}/${path}`,
            debug,
            secretKey,
            timeoutMs,
            searchParams,
            beforeRequest: [this.throttleHook],
        });
    }

    private async getOne(path: string): Promise<unknown> {
        return await this.request(path, "GET");
    }

    private async request(
        path: string,
        method: "GET" | "DELETE",
        searchParams?: Record<string, string | number>,
    ): Promise<unknown> {
        const gotOpts = this.gotOpts(path, searchParams);
        gotOpts.method = method;
        try {
            const res = await got<unknown>(gotOpts);
            return res.body;
        } catch (err: unknown) {
            if (err instanceof RequestError) {
                throw RegistryError.fromRequestError(err);
            }
            throw err;
        }
    }

    /**
     * Fetch every page of a list endpoint. The API numbers pages from 1 and a
     * page shorter than PAGE_SIZE is the last one.
     */
    private async getAll<T>(
        path: string,
        key: string,
        isItem: (item: unknown) => item is T,
        searchParams: Record<string, string | number> = {},
    ): Promise<T[]> {
        const params = { ...searchParams, page: 1, page_size: PAGE_SIZE };
        let page = 1;
        const gotOpts: OptionsWithPagination<T, unknown> = {
            ...this.gotOpts(path, params),
            pagination: {
                transform: (res: Response<unknown>): T[] =>
                    parseListPage(res.body, key, isItem),
                paginate: ({ currentItems }) => {
                    if (currentItems.length < PAGE_SIZE) {
                        return false;
                    }
                    page++;
                    return { searchParams: { ...params, page } };
                },
            },
        };
        log().debug("Listing %s", path);
        try {
            return await got.paginate.all<T, unknown>(gotOpts);
        } catch (err: unknown) {
            if (err instanceof RequestError) {
                throw RegistryError.fromRequestError(err);
            }
            throw err;
        }
    }

    private invalidBody(path: string, body: unknown): RegistryError {
        return new RegistryError(
            `Unexpected response body for '${path}':\n` +
                `Response body: ${inspect(body, { depth: 5 })}`,
        );
    }
}
