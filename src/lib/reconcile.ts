import fs from "node:fs/promises";
import osPath from "path";
import logger from "./logger";
import { listPackageFiles } from "./fs";
import { type Downloader, downloadFile } from "./download";
import type { DesiredSet } from "./repo";

export type DownloadReport = {
    downloaded: string[],
    failed: string[],
};

/**
 * Deletes every package archive of `dir` that is not part of the desired set. Both a failed
 * listing and a failed deletion abort the run.
 */
export async function removeOrphanedPackages(dir: string, desired: DesiredSet): Promise<string[]> {
    const removed: string[] = [];
    for (const filename of await listPackageFiles(dir)) {
        if (desired.has(filename)) {
            continue;
        }
        logger.verbose(`Removing orphaned package: ${ filename }`);
        try {
            await fs.unlink(osPath.join(dir, filename));
        } catch (err) {
            throw new Error(`Failed to remove orphaned package ${ filename }`, { cause: err });
        }
        removed.push(filename);
    }
    if (removed.length > 0) {
        logger.info(`Removed ${ removed.length } orphaned packages`);
    }
    return removed;
}

/**
 * Downloads the desired packages missing from `dir`, one after another. Files already present
 * are kept as they are; a failed download is logged and skipped.
 */
export async function downloadNewPackages(dir: string, desired: DesiredSet,
    download: Downloader = downloadFile): Promise<DownloadReport> {
    const present = new Set(await listPackageFiles(dir));
    const report: DownloadReport = { downloaded: [], failed: [] };

    for (const [filename, pkg] of desired) {
        if (present.has(filename)) {
            logger.debug(`Keeping existing package: ${ filename }`);
            continue;
        }
        logger.verbose(`Downloading package: ${ filename } from ${ pkg.sourceUrl }`);
        try {
            await download(pkg.sourceUrl, osPath.join(dir, filename));
            report.downloaded.push(filename);
        } catch (err) {
            logger.warn(`Failed to download ${ filename }`, { err });
            report.failed.push(filename);
        }
    }

    if (report.downloaded.length > 0) {
        logger.info(`Downloaded ${ report.downloaded.length } new packages`);
    }
    if (report.failed.length > 0) {
        logger.warn(`Failed to download ${ report.failed.length } packages`);
    }
    return report;
}
