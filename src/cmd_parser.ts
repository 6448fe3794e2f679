/**
 * Command line parsing code.
 *
 * Subcommand parsing was inspired by Kevin Gibbon's gist:
 * https://gist.github.com/bakkot/d14826a356fa7ac7e5d9385c2c794432
 *
 * Copyright (C) 2025 Paulo Ferreira de Castro
 * Licensed under the Open Software License version 3.0, a copy of which can be
 * found in the LICENSE file.
 */

import { type ParseArgsConfig, parseArgs } from "node:util";

import { CRITERIA_KEYS } from "./config.js";

export class CmdLineParserError extends Error {}

export const RUN_CMD_NAME = "run";
export const REPORT_CMD_NAME = "report";

export interface PurgeCmdOpts {
    command: typeof RUN_CMD_NAME | typeof REPORT_CMD_NAME;
    /** Configuration keys set on the command line, overriding the environment. */
    overrides: Record<string, string>;
}

export function isReportCmdOpts(opts: PurgeCmdOpts): boolean {
    return opts.command === REPORT_CMD_NAME;
}

export function printUsage() {
    console.log(`
Purge tags and empty namespaces from a Scaleway container registry.

Usage:
registry-purge --help
registry-purge run [options]
registry-purge report [options]

Subcommands:
run     Delete the tags (and optionally the empty namespaces) selected by the
        deletion criteria.
report  Evaluate the deletion criteria and report what would be deleted,
        without deleting anything. A namespace counts as empty when each of
        its images would lose all its tags.

Options (each overrides the environment variable named in brackets):
--namespace ID       Only process images of this namespace [NAMESPACE_ID].
--image ID           Only process this image, ignoring --namespace [IMAGE_ID].
--pattern REGEX      Delete tags whose name matches REGEX [TAG_NAME_PATTERN].
--keep-old           Do not delete tags older than 90 days [DELETE_OLD_TAGS].
--delete-namespaces  Delete namespaces left without images [DELETE_UNUSED_NAMESPACE].

Environment:
REGION, SCW_SECRET_KEY  Registry region and API secret key (required).
SCW_API_URL             API base URL, default https://api.scaleway.com.
DEBUG, LOG_LEVEL        Logging verbosity.
`);
}

const subcmdOptions = {
    namespace: { type: "string" },
    image: { type: "string" },
    pattern: { type: "string" },
    "keep-old": { type: "boolean" },
    "delete-namespaces": { type: "boolean" },
} satisfies ParseArgsConfig["options"];

/**
 * Parse the command line. Returns undefined if usage help was printed.
 *
 * @param args Arguments excluding execPath and filename.
 */
export function parseCmdLine(args: string[] = process.argv.slice(2)): PurgeCmdOpts | undefined {
    const mainOptConfig = {
        help: { type: "boolean", short: "h" },
    } satisfies ParseArgsConfig["options"];
    const { tokens } = parseArgs({
        options: mainOptConfig,
        args,
        strict: false,
        tokens: true,
    });

    // Find subcommands
    const subcmdIndex = tokens.find((e) => e.kind === "positional")?.index ?? args.length;
    const subcmd = args[subcmdIndex];
    const subcmdArgs = args.slice(subcmdIndex + 1);

    // Parse the main (common) options
    const { values } = parseArgs({
        options: mainOptConfig,
        args: args.slice(0, subcmdIndex),
    });
    if (
        values.help ||
        subcmd === undefined ||
        subcmdArgs.includes("--help") ||
        subcmdArgs.includes("-h")
    ) {
        printUsage();
        return;
    }
    if (subcmd !== RUN_CMD_NAME && subcmd !== REPORT_CMD_NAME) {
        throw new CmdLineParserError(
            `Command line parser: Unknown subcommand '${subcmd}'`,
        );
    }
    return { command: subcmd, overrides: parsePurgeOptions(subcmd, subcmdArgs) };
}

function parsePurgeOptions(cmdName: string, args: string[]): Record<string, string> {
    const { values, positionals } = parseArgs({
        options: subcmdOptions,
        args,
        allowPositionals: true,
    });
    if (positionals.length) {
        throw new CmdLineParserError(
            `The ‘${cmdName}’ subcommand takes no positional arguments.`,
        );
    }
    const K = CRITERIA_KEYS;
    const overrides: Record<string, string> = {};
    const strOpts = [
        [values.namespace, K.targetNamespaceId, "--namespace"],
        [values.image, K.targetImageId, "--image"],
        [values.pattern, K.namePattern, "--pattern"],
    ] as const;
    for (const [value, key, flag] of strOpts) {
        if (value === undefined) {
            continue;
        }
        if (!value.trim()) {
            throw new CmdLineParserError(`Option ${flag} requires a non-blank value.`);
        }
        overrides[key] = value;
    }
    if (values["keep-old"]) {
        overrides[K.deleteOldTags] = "false";
    }
    if (values["delete-namespaces"]) {
        overrides[K.deleteUnusedNamespaces] = "true";
    }
    return overrides;
}
