/**
 * Convenience wrappers around the ‘got’ HTTP client library.
 *
 * Copyright (C) 2025 Paulo Ferreira de Castro
 * Licensed under the Open Software License version 3.0, a copy of which can be
 * found in the LICENSE file.
 */

import { inspect } from "node:util";

import type {
    AfterResponseHook,
    BeforeRequestHook,
    Hooks,
    Options,
    OptionsOfJSONResponseBody,
    OptionsWithPagination,
    Response,
} from "got";

import { getLogger } from "./util.js";

const log = () => getLogger();

/**
 * Options shared by every registry API request.
 *
 * @param opts.secretKey Sent in the ‘X-Auth-Token’ header.
 * @param opts.timeoutMs Overall timeout of a single request.
 * @param opts.beforeRequest Hooks run before every request, debug hooks excluded.
 */
export function getCommonGotOpts<ElementType, BodyType>(opts: {
    url: string;
    debug: boolean;
    secretKey: string;
    timeoutMs: number;
    searchParams?: Record<string, string | number>;
    beforeRequest?: BeforeRequestHook[];
}): OptionsOfJSONResponseBody & OptionsWithPagination<ElementType, BodyType> {
    const { url, debug, secretKey, timeoutMs, searchParams, beforeRequest } = opts;
    const gotOpts: OptionsOfJSONResponseBody &
        OptionsWithPagination<ElementType, BodyType> = {
        url,
        responseType: "json",
        headers: { "X-Auth-Token": secretKey },
        timeout: { request: timeoutMs },
        retry: { limit: 0 },
    };
    if (searchParams) {
        gotOpts.searchParams = searchParams;
    }
    if (beforeRequest) {
        gotOpts.hooks = { beforeRequest: [...beforeRequest] };
    }
    setDebugHooks({ gotOpts, debug });
    return gotOpts;
}

export function debugResponse(res: Response) {
    log().silly("response headers:\n%s", inspect(res.headers, { depth: 5 }));
    log().silly("response body:\n%s", inspect(res.body, { depth: 5 }));
}

export function getAfterResponseDebugHook(): AfterResponseHook {
    return (res: Response) => {
        debugResponse(res);
        return res;
    };
}

export function getBeforeRequestDebugHook(): BeforeRequestHook {
    return (options: Options) => {
        // Headers are not logged: they carry the secret key.
        log().debug("%s %s", options.method, String(options.url));
    };
}

export function setDebugHooks(opts: {
    gotOpts: { hooks?: Partial<Hooks> };
    debug: boolean;
}) {
    const { gotOpts, debug } = opts;
    if (debug) {
        const hooks = (gotOpts.hooks ||= {});
        hooks.beforeRequest = [...(hooks.beforeRequest || []), getBeforeRequestDebugHook()];
        hooks.afterResponse = [...(hooks.afterResponse || []), getAfterResponseDebugHook()];
    }
}
