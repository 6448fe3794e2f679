/**
 * Function entry point: one purge run per invocation.
 *
 * Copyright (C) 2025 Paulo Ferreira de Castro
 *
 * Licensed under the Open Software License version 3.0, a copy of which can be
 * found in the LICENSE file.
 */

import { resolveCriteria } from "./config.js";
import { runPurge } from "./purge.js";
import {
    type ClientConfig,
    type RegistryClient,
    ScalewayRegistryClient,
    resolveClientConfig,
} from "./registry.js";
import { toErrorResponse, toResponse } from "./report.js";
import type { Criteria, PurgeResponse } from "./types.js";
import { type EnvMap, getLogger, levelFromEnv } from "./util.js";

export interface InvokeDeps {
    createClient?: (config: ClientConfig) => RegistryClient;
    now?: () => Date;
    /** Force (or prevent) a dry run regardless of DRY_RUN. */
    dryRun?: boolean;
}

/**
 * Resolve the configuration from ‘env’ and run the purge once.
 *
 * Never rejects: fatal errors are mapped to a 400 (configuration) or 500
 * (anything else) response.
 */
export async function invoke(env: EnvMap, deps: InvokeDeps = {}): Promise<PurgeResponse> {
    const log = getLogger({ level: levelFromEnv(env) });
    const { createClient = (config) => new ScalewayRegistryClient(config) } = deps;
    let criteria: Criteria | undefined;
    try {
        criteria = resolveCriteria(env, { dryRun: deps.dryRun });
        const client = createClient(resolveClientConfig(env));
        const body = await runPurge({ client, criteria, now: deps.now?.() });
        return toResponse(body);
    } catch (err) {
        log.error("Purge aborted: %s", err instanceof Error ? err.stack : String(err));
        return toErrorResponse(err, criteria);
    }
}

/**
 * Handler called by the serverless function runtime. The event and context
 * arguments are not used: every setting comes from the environment.
 */
export async function handle(): Promise<PurgeResponse> {
    return await invoke(process.env);
}
