import { describe, expect, it } from "vitest";

import { ConfigurationError, RegistryError } from "../errors.js";
import {
    isImageBody,
    isTagBody,
    parseListPage,
    resolveClientConfig,
    toImage,
    toRegistryTag,
} from "../registry.js";

describe("resolveClientConfig", () => {
    it("applies the defaults", () => {
        expect(resolveClientConfig({ REGION: "nl-ams", SCW_SECRET_KEY: "test-secret" })).toStrictEqual({
            region: "nl-ams",
            secretKey: "test-secret",
            apiUrl: "https://api.scaleway.com",
            timeoutMs: 30000,
            debug: false,
        });
    });

    it("reads the optional keys", () => {
        const config = resolveClientConfig({
            REGION: "fr-par",
            SCW_SECRET_KEY: "test-secret",
            SCW_ACCESS_KEY: "test-access",
            SCW_API_URL: "http://localhost:8080/",
            REQUEST_TIMEOUT_MS: "5000",
            DEBUG: "1",
        });
        expect(config).not.toHaveProperty("accessKey");
        expect(config).toMatchObject({
            apiUrl: "http://localhost:8080",
            timeoutMs: 5000,
            debug: true,
        });
    });

    it.each([
        [{ SCW_SECRET_KEY: "test-secret" }, "Missing required configuration key REGION"],
        [{ REGION: "fr-par" }, "Missing required configuration key SCW_SECRET_KEY"],
        [
            { REGION: "fr-par", SCW_SECRET_KEY: "test-secret", REQUEST_TIMEOUT_MS: "soon" },
            "REQUEST_TIMEOUT_MS must be a positive integer, got 'soon'",
        ],
    ])("rejects %j", (env, message) => {
        expect(() => resolveClientConfig(env)).toThrow(new ConfigurationError(message));
    });
});

describe("response bodies", () => {
    const tagBody = {
        id: "t-1",
        name: "dev-1",
        image_id: "img-1",
        status: "ready",
        created_at: "2025-03-01T10:00:00Z",
        updated_at: "2025-03-02T10:00:00Z",
    };

    it("maps a tag body", () => {
        expect(isTagBody(tagBody)).toBe(true);
        expect(toRegistryTag(tagBody)).toEqual({
            id: "t-1",
            name: "dev-1",
            imageId: "img-1",
            createdAt: new Date("2025-03-01T10:00:00Z"),
            updatedAt: new Date("2025-03-02T10:00:00Z"),
        });
    });

    it("rejects a tag with an invalid timestamp", () => {
        expect(() => toRegistryTag({ ...tagBody, created_at: "yesterday" })).toThrow(
            RegistryError,
        );
    });

    it("maps an image body", () => {
        const body = { id: "img-1", name: "api", namespace_id: "ns-1", size: 0 };
        expect(isImageBody(body)).toBe(true);
        expect(toImage(body)).toEqual({ id: "img-1", name: "api", namespaceId: "ns-1" });
        expect(isImageBody({ id: "img-1", name: "api" })).toBe(false);
    });

    it("extracts the items of a list page", () => {
        const page = { images: [{ id: "img-1", name: "api", namespace_id: "ns-1" }], total_count: 1 };
        expect(parseListPage(page, "images", isImageBody)).toEqual(page.images);
    });

    it("rejects a list page with a missing key or a malformed item", () => {
        expect(() => parseListPage({ total_count: 0 }, "tags", isTagBody)).toThrow(RegistryError);
        expect(() => parseListPage({ tags: [{ id: "t-1" }] }, "tags", isTagBody)).toThrow(
            RegistryError,
        );
    });
});
