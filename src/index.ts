#!/usr/bin/env node
/**
 * Purge old or matching tags, and empty namespaces, from a Scaleway container registry.
 *
 * Copyright (C) 2025 Paulo Ferreira de Castro
 *
 * Licensed under the Open Software License version 3.0, a copy of which can be
 * found in the LICENSE file.
 */

import { CmdLineParserError, isReportCmdOpts, parseCmdLine } from "./cmd_parser.js";
import type { PurgeCmdOpts } from "./cmd_parser.js";
import { invoke } from "./handler.js";
import { getLogger, levelFromEnv } from "./util.js";

async function runCmd(opts: PurgeCmdOpts) {
    const env = { ...process.env, ...opts.overrides };
    const response = await invoke(env, { dryRun: isReportCmdOpts(opts) || undefined });
    console.log(JSON.stringify(response.body, null, 2));
    if (response.statusCode !== 200) {
        process.exitCode ||= 1;
    }
}

export async function main() {
    const log = getLogger({ level: levelFromEnv(process.env) });
    log.debug("Starting");

    try {
        let opts: PurgeCmdOpts | undefined;
        try {
            opts = parseCmdLine();
        } catch (err) {
            if (err instanceof TypeError) {
                throw new CmdLineParserError(err.message);
            }
            throw err;
        }
        if (!opts) {
            return;
        }
        await runCmd(opts);
    } catch (err) {
        process.exitCode ||= 1;
        if (err instanceof CmdLineParserError) {
            log.error(err.message);
            return;
        }
        log.error(err instanceof Error ? err.stack : String(err));
    }
}

await main();
