import fs from "node:fs/promises";
import osPath from "path";
import fsExtra from "fs-extra";
import prettyBytes from "pretty-bytes";
import type { RunConfig } from "./config";
import { listPackageFiles } from "./fs";
import { databaseFileList } from "./database";
import { metadataFile } from "./metadata";
import { CHANNELS, type Channel, databaseNames } from "./repo";

export type FileStatus = {
    name: string,
    size?: number,
    linkTarget?: string,
};

export type RepositoryStatus = {
    channel: Channel,
    dbBaseName: string,
    repoArchDir: string,
    apiDir: string,
    directoryExists: boolean,
    packages: FileStatus[],
    databaseFiles: FileStatus[],
    apiFiles: FileStatus[],
    configFile: FileStatus,
};

async function fileStatus(filePath: string, name: string = osPath.basename(filePath)): Promise<FileStatus | undefined> {
    let linkStat;
    try {
        linkStat = await fs.lstat(filePath);
    } catch {
        return undefined;
    }
    if (!linkStat.isSymbolicLink()) {
        return { name, size: linkStat.size };
    }
    const linkTarget = await fs.readlink(filePath);
    const targetStat = await fs.stat(filePath).catch(() => undefined);
    return { name, size: targetStat?.size, linkTarget };
}

/**
 * Collects what is on disk for the channel without touching anything.
 */
export async function collectStatus(config: RunConfig): Promise<RepositoryStatus> {
    const directoryExists = await fsExtra.pathExists(config.repoArchDir);
    const packages: FileStatus[] = [];
    const databaseFiles: FileStatus[] = [];
    if (directoryExists) {
        for (const filename of await listPackageFiles(config.repoArchDir)) {
            const status = await fileStatus(osPath.join(config.repoArchDir, filename));
            if (status) {
                packages.push(status);
            }
        }
        for (const name of databaseFileList(databaseNames(config.dbBaseName))) {
            const status = await fileStatus(osPath.join(config.repoArchDir, name));
            if (status) {
                databaseFiles.push(status);
            }
        }
    }

    const apiFiles: FileStatus[] = [];
    for (const channel of CHANNELS) {
        const filePath = metadataFile(config.apiDir, channel);
        apiFiles.push(await fileStatus(filePath) ?? { name: osPath.basename(filePath) });
    }

    const configFile = await fileStatus(config.configFile, config.configFile) ?? { name: config.configFile };

    return {
        channel: config.channel,
        dbBaseName: config.dbBaseName,
        repoArchDir: config.repoArchDir,
        apiDir: config.apiDir,
        directoryExists,
        packages,
        databaseFiles,
        apiFiles,
        configFile,
    };
}

export function formatSize(size: number | undefined): string {
    return size === undefined ? "not found" : prettyBytes(size, { binary: true });
}

export function formatStatus(status: RepositoryStatus): string[] {
    const lines = [
        "=== Repository Structure ===",
        `Current mode: ${ status.channel } repository`,
        `Database name: ${ status.dbBaseName }`,
        `Architecture directory: ${ status.repoArchDir }`,
        `API directory: ${ status.apiDir }`,
        "",
    ];

    if (status.directoryExists) {
        lines.push(`=== Packages in ${ status.channel } repository ===`);
        for (const pkg of status.packages) {
            lines.push(`  ${ pkg.name } (${ formatSize(pkg.size) })`);
        }
        lines.push(status.packages.length === 0 ? "  No packages found" : `  Total: ${ status.packages.length } packages`);
    } else {
        lines.push(`Repository directory does not exist: ${ status.repoArchDir }`);
    }
    lines.push("");

    lines.push("=== Database Files ===");
    for (const file of status.databaseFiles) {
        lines.push(`  ${ file.name } (${ formatSize(file.size) })${ file.linkTarget ? ` -> ${ file.linkTarget }` : "" }`);
    }
    lines.push("");

    lines.push("=== API Files ===");
    for (const file of status.apiFiles) {
        lines.push(`  ${ file.name } (${ formatSize(file.size) })`);
    }
    lines.push("");

    lines.push(`Configuration file: ${ status.configFile.name } (${ formatSize(status.configFile.size) })`);
    return lines;
}
