import fs from "node:fs/promises";
import osPath from "path";
import logger from "./logger";
import { describeFailure, execOpt } from "./exec";
import { listPackageFiles, removeQuietly } from "./fs";
import { databaseNames, type DatabaseNames } from "./repo";

export type DatabaseReport = {
    names: DatabaseNames,
    packages: number,
    empty: boolean,
    linked: boolean,
};

export function databaseFileList(names: DatabaseNames): string[] {
    return [names.db, names.dbArchive, names.files, names.filesArchive];
}

export async function removeDatabaseFiles(dir: string, dbBaseName: string): Promise<string[]> {
    logger.debug(`Removing old database files for: ${ dbBaseName }`);
    return await removeQuietly(dir, databaseFileList(databaseNames(dbBaseName)));
}

async function relink(dir: string, target: string, link: string): Promise<boolean> {
    const linkPath = osPath.join(dir, link);
    try {
        await fs.rm(linkPath, { force: true });
        await fs.symlink(target, linkPath);
        return true;
    } catch (err) {
        logger.warn(`Failed to link ${ linkPath } to ${ target }`, { err });
        return false;
    }
}

/**
 * Regenerates the repository database of `dir` from the package archives it holds. The indexing
 * tool runs with `dir` as its working directory; the process working directory is never changed.
 * An empty directory gets empty archives.
 */
export async function rebuildDatabase(dir: string, dbBaseName: string, repoAddBin: string): Promise<DatabaseReport> {
    const names = databaseNames(dbBaseName);
    await removeDatabaseFiles(dir, dbBaseName);

    const packages = await listPackageFiles(dir);
    if (packages.length > 0) {
        const result = await execOpt({ cwd: dir, levelFn: () => "verbose" }, repoAddBin, names.dbArchive, ...packages);
        if (result.result !== "success") {
            throw new Error(`Failed to run ${ repoAddBin }: ${ describeFailure(result) }`);
        }
        logger.info(`Updated repository database ${ names.dbArchive } with ${ packages.length } packages`);
    } else {
        try {
            await fs.writeFile(osPath.join(dir, names.dbArchive), "");
            await fs.writeFile(osPath.join(dir, names.filesArchive), "");
        } catch (err) {
            throw new Error(`Failed to create empty repository database in ${ dir }`, { cause: err });
        }
        logger.info("Created empty repository database");
    }

    const dbLinked = await relink(dir, names.dbArchive, names.db);
    const filesLinked = await relink(dir, names.filesArchive, names.files);

    return { names, packages: packages.length, empty: packages.length === 0, linked: dbLinked && filesLinked };
}
