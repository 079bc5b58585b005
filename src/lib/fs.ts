import fs from "node:fs/promises";
import osPath from "path";
import fsExtra from "fs-extra";
import logger from "./logger";
import { isPackageFile } from "./repo";

/**
 * Moves a finished download to its final name, replacing whatever is there.
 */
export async function move(tempPath: string, targetPath: string): Promise<void> {
    try {
        await fsExtra.move(tempPath, targetPath, { overwrite: true });
        logger.debug(`Successfully moved ${ osPath.basename(tempPath) } to ${ targetPath }`);
    } catch (err: unknown) {
        throw new Error(`Error moving file ${ tempPath } to ${ targetPath }`, { cause: err });
    }
}

export function isNotFound(err: unknown): boolean {
    return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Lists package archives of a directory in filename order. Any failure to read the directory
 * is thrown.
 */
export async function listPackageFiles(dir: string): Promise<string[]> {
    let entries;
    try {
        entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
        throw new Error(`Failed to read repository directory ${ dir }`, { cause: err });
    }
    return entries
        .filter((entry) => entry.isFile() && isPackageFile(entry.name))
        .map((entry) => entry.name)
        .sort();
}

/**
 * Same as {@link listPackageFiles}, but a missing directory has no packages.
 */
export async function listPackageFilesIfExists(dir: string): Promise<string[]> {
    if (!await fsExtra.pathExists(dir)) {
        return [];
    }
    return await listPackageFiles(dir);
}

export async function ensureDirs(...dirs: string[]): Promise<void> {
    for (const dir of dirs) {
        try {
            await fsExtra.ensureDir(dir);
        } catch (err) {
            throw new Error(`Failed to create directory ${ dir }`, { cause: err });
        }
    }
}

/**
 * Removes files and links, logging failures as warnings. Returns the names that were removed.
 */
export async function removeQuietly(dir: string, names: string[]): Promise<string[]> {
    const removed: string[] = [];
    for (const name of names) {
        const filePath = osPath.join(dir, name);
        try {
            await fs.unlink(filePath);
            removed.push(name);
        } catch (err) {
            if (!isNotFound(err)) {
                logger.warn(`Failed to remove ${ filePath }`, { err });
            }
        }
    }
    return removed;
}
