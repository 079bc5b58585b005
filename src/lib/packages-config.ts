import fs from "node:fs/promises";
import osPath from "path";
import fsExtra from "fs-extra";
import * as yaml from "js-yaml";
import _ from "lodash";
import dedent from "dedent";
import logger from "./logger";
import {
    accepted,
    acceptedValues,
    type Channel,
    CHANNELS,
    type DirectSource,
    type ForgeProject,
    isChannel,
    type Outcome,
    rejected,
    type Rejection,
} from "./repo";

export type PackagesConfig = {
    forgeProjects: ForgeProject[],
    directSources: DirectSource[],
    rejected: Rejection[],
};

export type LoadedPackagesConfig =
    | { status: "loaded", config: PackagesConfig }
    | { status: "template-created", path: string };

type RawEntry = Record<string, unknown>;

function isRawEntry(value: unknown): value is RawEntry {
    return _.isPlainObject(value);
}

const TEMPLATE = {
    forge_projects: [
        {
            id: "12345",
            name: "example-package",
            channels: ["stable", "testing"],
            enabled: true,
        },
    ],
    remote_urls: [
        {
            url: "https://example.com/example-package-1.0-1-x86_64.pkg.tar.zst",
            channel: "stable",
            enabled: true,
        },
    ],
};

function parseChannels(value: unknown): Channel[] | undefined {
    const names = _.isString(value) ?
        value.split(";") :
        Array.isArray(value) ? value.filter(_.isString) : undefined;
    if (names === undefined) {
        return undefined;
    }
    const trimmed = names.map((name) => name.trim()).filter(Boolean);
    if (trimmed.length === 0 || !trimmed.every(isChannel)) {
        return undefined;
    }
    // Keep the canonical order and drop duplicates
    return CHANNELS.filter((channel) => trimmed.includes(channel));
}

function parseId(value: unknown): string | undefined {
    if (_.isNumber(value) && Number.isInteger(value)) {
        return String(value);
    }
    return _.isString(value) && value.trim() ? value.trim() : undefined;
}

export function parseForgeProject(entry: unknown, index: number, defaultProjectId?: string): Outcome<ForgeProject> {
    if (!isRawEntry(entry)) {
        return rejected("invalid", `forge project #${ index + 1 } is not a mapping`);
    }
    const raw = entry;
    const id = parseId(raw.id) ?? defaultProjectId;
    const name = _.isString(raw.name) && raw.name.trim() ? raw.name.trim() : id;
    if (!id || !name) {
        return rejected("invalid", `forge project #${ index + 1 } has no id and no default project id is set`);
    }
    const channels = parseChannels(raw.channels ?? raw.repository);
    if (!channels) {
        return rejected("invalid", `forge project ${ name } has no valid channels (expected ${ CHANNELS.join(", ") })`);
    }
    return accepted({ id, name, channels, enabled: raw.enabled === true });
}

export function parseDirectSource(entry: unknown, index: number): Outcome<DirectSource> {
    if (!isRawEntry(entry)) {
        return rejected("invalid", `remote URL #${ index + 1 } is not a mapping`);
    }
    const raw = entry;
    const url = _.isString(raw.url) ? raw.url.trim() : "";
    if (!url) {
        return rejected("invalid", `remote URL #${ index + 1 } has no url`);
    }
    const channel = raw.channel ?? raw.repository;
    if (!isChannel(channel)) {
        return rejected("invalid", `remote URL ${ url } has no valid channel (expected ${ CHANNELS.join(" or ") })`);
    }
    return accepted({ url, channel, enabled: raw.enabled === true });
}

function entriesOf(document: RawEntry, ...keys: string[]): unknown[] {
    for (const key of keys) {
        const value = document[key];
        if (value === undefined || value === null) {
            continue;
        }
        if (!Array.isArray(value)) {
            throw new Error(`Configuration key ${ key } must be a list`);
        }
        return value;
    }
    return [];
}

export function parsePackagesConfig(content: string, defaultProjectId?: string): PackagesConfig {
    let document: unknown;
    try {
        document = yaml.load(content);
    } catch (err) {
        throw new Error("Unable to parse packages configuration", { cause: err });
    }
    if (document === undefined || document === null) {
        document = {};
    }
    if (!isRawEntry(document)) {
        throw new Error("Packages configuration must be a mapping");
    }

    const raw = document;
    const projectOutcomes = entriesOf(raw, "forge_projects", "gitlab_projects")
        .map((entry, index) => parseForgeProject(entry, index, defaultProjectId));
    const urlOutcomes = entriesOf(raw, "remote_urls")
        .map((entry, index) => parseDirectSource(entry, index));

    const rejections = [...projectOutcomes, ...urlOutcomes]
        .flatMap((outcome) => outcome.status === "rejected" ? [outcome.rejection] : []);

    return {
        forgeProjects: acceptedValues(projectOutcomes),
        directSources: acceptedValues(urlOutcomes),
        rejected: rejections,
    };
}

export function templateContent(): string {
    return dedent`
        # Package sources mirrored into the repository.
        # forge_projects: releases of GitLab projects; with both channels listed, testing gets the
        #   latest release and stable the one before it.
        # remote_urls: single package files downloaded as-is.
        #\n
    ` + yaml.dump(TEMPLATE);
}

/**
 * Reads the packages configuration. A missing file is replaced by a template and reported as
 * such, so the caller can skip the run.
 */
export async function loadPackagesConfig(configFile: string, defaultProjectId?: string): Promise<LoadedPackagesConfig> {
    if (!await fsExtra.pathExists(configFile)) {
        const dir = osPath.dirname(configFile);
        try {
            await fsExtra.ensureDir(dir);
            await fs.writeFile(configFile, templateContent(), "utf8");
        } catch (err) {
            throw new Error(`Failed to create template configuration ${ configFile }`, { cause: err });
        }
        logger.warn(`Created template configuration ${ configFile }, edit it and run again`);
        return { status: "template-created", path: configFile };
    }

    let content: string;
    try {
        content = await fs.readFile(configFile, "utf8");
    } catch (err) {
        throw new Error(`Failed to read packages configuration ${ configFile }`, { cause: err });
    }

    const config = parsePackagesConfig(content, defaultProjectId);
    for (const rejection of config.rejected) {
        logger.warn(`Ignoring configuration entry: ${ rejection.reason }`);
    }
    logger.verbose(`Loaded ${ config.forgeProjects.length } forge projects and ${
        config.directSources.length } remote URLs from ${ configFile }`);
    return { status: "loaded", config };
}
