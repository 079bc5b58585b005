import fs from "node:fs/promises";
import osPath from "path";
import fsExtra from "fs-extra";
import logger from "./logger";
import { describeFailure, execOpt } from "./exec";
import { listPackageFiles } from "./fs";
import type { Channel, PackageRecord } from "./repo";

export const MISSING_FIELD = "None";

type InspectedFields = Pick<PackageRecord, "name" | "version" | "description" | "architecture" | "depends" | "groups">;

const FIELD_KEYS: Record<string, keyof InspectedFields> = {
    "Name": "name",
    "Version": "version",
    "Description": "description",
    "Architecture": "architecture",
    "Depends On": "depends",
    "Groups": "groups",
};

/**
 * Parses the `Key : Value` listing printed by `pacman -Qip`. Indented lines continue the value
 * of the previous key.
 */
export function parsePackageInfo(output: string): InspectedFields {
    const fields: InspectedFields = {
        name: MISSING_FIELD,
        version: MISSING_FIELD,
        description: MISSING_FIELD,
        architecture: MISSING_FIELD,
        depends: MISSING_FIELD,
        groups: MISSING_FIELD,
    };

    let lastField: keyof InspectedFields | undefined = undefined;
    for (const line of output.split(/\r?\n/)) {
        if (line.trim().length === 0) {
            lastField = undefined;
            continue;
        }
        if (/^\s/.test(line)) {
            if (lastField !== undefined) {
                fields[lastField] = `${ fields[lastField] } ${ line.trim() }`;
            }
            continue;
        }
        const separator = line.indexOf(":");
        if (separator < 0) {
            lastField = undefined;
            continue;
        }
        const key = line.substring(0, separator).trim();
        const value = line.substring(separator + 1).trim();
        lastField = Object.hasOwn(FIELD_KEYS, key) ? FIELD_KEYS[key] : undefined;
        if (lastField !== undefined && value) {
            fields[lastField] = value;
        }
    }
    return fields;
}

function pad(value: number): string {
    return String(value).padStart(2, "0");
}

export function formatModified(date: Date): string {
    return `${ date.getFullYear() }-${ pad(date.getMonth() + 1) }-${ pad(date.getDate()) } ` +
        `${ pad(date.getHours()) }:${ pad(date.getMinutes()) }:${ pad(date.getSeconds()) }`;
}

export async function extractPackageRecord(dir: string, filename: string, channel: Channel,
    pacmanBin: string): Promise<PackageRecord> {
    const pkgPath = osPath.join(dir, filename);
    const result = await execOpt({ captureStdout: true, commandLevel: "debug", levelFn: () => "debug" },
        pacmanBin, "-Qip", pkgPath);
    if (result.result !== "success") {
        throw new Error(`${ pacmanBin } -Qip failed: ${ describeFailure(result) }`);
    }

    const fields = parsePackageInfo(result.output);
    const stat = await fs.stat(pkgPath);
    return {
        ...fields,
        filename,
        size: String(stat.size),
        modified: formatModified(stat.mtime),
        channel,
    };
}

export function metadataFile(apiDir: string, channel: Channel): string {
    return osPath.join(apiDir, `${ channel }.json`);
}

export async function writeMetadata(apiDir: string, channel: Channel, records: PackageRecord[]): Promise<string> {
    const outputPath = metadataFile(apiDir, channel);
    try {
        await fsExtra.ensureDir(apiDir);
        await fs.writeFile(outputPath, JSON.stringify(records, null, 2), "utf8");
    } catch (err) {
        throw new Error(`Failed to write ${ outputPath }`, { cause: err });
    }
    return outputPath;
}

/**
 * Inspects every package archive of `dir` and writes the records to `<apiDir>/<channel>.json`.
 * Packages that cannot be inspected are left out.
 */
export async function generateMetadata(dir: string, apiDir: string, channel: Channel,
    pacmanBin: string): Promise<PackageRecord[]> {
    const records: PackageRecord[] = [];
    for (const filename of await listPackageFiles(dir)) {
        try {
            records.push(await extractPackageRecord(dir, filename, channel, pacmanBin));
        } catch (err) {
            logger.warn(`Failed to extract package info for ${ filename }`, { err });
        }
    }

    const outputPath = await writeMetadata(apiDir, channel, records);
    logger.info(`Generated ${ osPath.basename(outputPath) } with ${ records.length } packages`);
    return records;
}
