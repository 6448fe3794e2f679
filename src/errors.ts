/**
 * Error classes of the purge job.
 *
 * Fatal errors (ConfigurationError, EnumerationError) abort a run. Failures of
 * a single tag, image or namespace never leave the engine as exceptions: they
 * are recorded as ‘error’ outcomes instead.
 *
 * Copyright (C) 2025 Paulo Ferreira de Castro
 *
 * Licensed under the Open Software License version 3.0, a copy of which can be
 * found in the LICENSE file.
 */

import type { RequestError } from "got";

export class ConfigurationError extends Error {
    name = "ConfigurationError";
}

export type EnumerationScope = "all" | "namespace" | "image";

export class EnumerationError extends Error {
    name = "EnumerationError";
    scope: EnumerationScope;

    constructor(message: string, scope: EnumerationScope, options?: { cause?: unknown }) {
        super(message, options);
        this.scope = scope;
    }
}

export class RegistryError extends Error {
    name = "RegistryError";
    statusCode: number;

    constructor(message: string, statusCode: number = 1) {
        super(message);
        this.statusCode = statusCode;
    }

    static fromRequestError(err: RequestError, altStatusCode: number = 1) {
        // RequestError may expose sensitive metadata such as auth headers.
        return new RegistryError(
            `Request error: code=${err.code} statusCode=${err.response?.statusCode}\n` +
                `${err.message}`,
            err.response?.statusCode || altStatusCode,
        );
    }
}
