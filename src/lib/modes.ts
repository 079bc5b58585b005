import osPath from "path";
import fs from "node:fs/promises";
import logger, { setLogLevel, withLogChannel } from "./logger";
import type { RunConfig } from "./config";
import { ensureDirs, listPackageFilesIfExists } from "./fs";
import { type ForgeClient, GitlabClient } from "./gitlab";
import { loadPackagesConfig } from "./packages-config";
import { resolveForgeProjects } from "./releases";
import { resolveDirectSources } from "./sources";
import { mergePackageSets } from "./merge";
import { type DownloadReport, downloadNewPackages, removeOrphanedPackages } from "./reconcile";
import { type Downloader, downloadFile } from "./download";
import { type DatabaseReport, rebuildDatabase, removeDatabaseFiles } from "./database";
import { generateMetadata, writeMetadata } from "./metadata";
import { collectStatus, formatStatus } from "./status";

export type SyncDependencies = {
    forgeClient?: ForgeClient,
    download?: Downloader,
};

export type SyncReport =
    | { status: "template-created", configFile: string }
    | {
        status: "synced",
        desired: number,
        removed: string[],
        downloads: DownloadReport,
        database: DatabaseReport,
        metadata: number,
    };

export type CleanReport = {
    removedPackages: string[],
    removedDatabaseFiles: string[],
    metadataFile: string,
};

function applyLogLevel(config: RunConfig): void {
    if (config.logLevel) {
        setLogLevel(config.logLevel);
    }
}

function createForgeClient(config: RunConfig): ForgeClient | undefined {
    if (!config.gitlab.token) {
        logger.debug("No GitLab token provided - will only process remote URLs");
        return undefined;
    }
    return new GitlabClient(config.gitlab.apiUrl, config.gitlab.token);
}

/**
 * Makes the channel directory, its database and its metadata match the configured sources.
 */
export async function runSync(config: RunConfig, deps: SyncDependencies = {}): Promise<SyncReport> {
    applyLogLevel(config);
    return await withLogChannel(config.channel, async () => {
        logger.info(`Syncing packages for repository: ${ config.channel }`);
        logger.debug(`Database ${ config.dbBaseName } in ${ config.repoArchDir }, metadata in ${ config.apiDir }`);

        const loaded = await loadPackagesConfig(config.configFile, config.gitlab.defaultProjectId);
        if (loaded.status === "template-created") {
            return { status: "template-created", configFile: loaded.path };
        }
        const { forgeProjects, directSources } = loaded.config;

        await ensureDirs(config.repoArchDir, config.apiDir);

        const forgeClient = deps.forgeClient ?? createForgeClient(config);
        const desired = mergePackageSets({
            forge: await resolveForgeProjects(forgeClient, forgeProjects, config.channel),
            direct: resolveDirectSources(directSources, config.channel),
        });

        const removed = await removeOrphanedPackages(config.repoArchDir, desired);
        const downloads = await downloadNewPackages(config.repoArchDir, desired, deps.download ?? downloadFile);
        const database = await rebuildDatabase(config.repoArchDir, config.dbBaseName, config.tools.repoAdd);
        const records = await generateMetadata(config.repoArchDir, config.apiDir, config.channel, config.tools.pacman);

        logger.info("Package management completed successfully");
        return {
            status: "synced",
            desired: desired.size,
            removed,
            downloads,
            database,
            metadata: records.length,
        };
    });
}

/**
 * Empties the channel: no package archives, no database, `[]` metadata.
 */
export async function runClean(config: RunConfig): Promise<CleanReport> {
    applyLogLevel(config);
    return await withLogChannel(config.channel, async () => {
        logger.info(`Starting cleanup of ${ config.channel } repository, database ${ config.dbBaseName }`);

        const packages = await listPackageFilesIfExists(config.repoArchDir);
        if (packages.length === 0) {
            logger.info("No package files to remove");
        }
        for (const filename of packages) {
            logger.verbose(`Removing package: ${ filename }`);
            try {
                await fs.unlink(osPath.join(config.repoArchDir, filename));
            } catch (err) {
                throw new Error(`Failed to remove package ${ filename }`, { cause: err });
            }
        }

        const removedDatabaseFiles = await removeDatabaseFiles(config.repoArchDir, config.dbBaseName);
        for (const name of removedDatabaseFiles) {
            logger.verbose(`Removed database file: ${ name }`);
        }

        const metadataFile = await writeMetadata(config.apiDir, config.channel, []);
        logger.info(`Removed ${ packages.length } packages and ${ removedDatabaseFiles.length } database files, ` +
            `created empty ${ osPath.basename(metadataFile) }`);
        return { removedPackages: packages, removedDatabaseFiles, metadataFile };
    });
}

export type StatusWriter = (line: string) => void;

export async function runStatus(config: RunConfig,
    write: StatusWriter = (line) => process.stdout.write(`${ line }\n`)): Promise<void> {
    applyLogLevel(config);
    await withLogChannel(config.channel, async () => {
        const status = await collectStatus(config);
        for (const line of formatStatus(status)) {
            write(line);
        }
    });
}
