import path from "node:path/posix";
import logger from "./logger";
import {
    accepted,
    acceptedValues,
    type Channel,
    type DirectSource,
    isPackageFile,
    isPlainFilename,
    PACKAGE_SUFFIX,
    rejected,
    type ResolvedPackage,
    type SourceOutcome,
} from "./repo";

export function filenameFromUrl(url: string): string {
    return path.basename(url.split("?")[0]);
}

export function resolveDirectSource(source: DirectSource, channel: Channel): SourceOutcome {
    const url = source.url.trim();
    if (!source.enabled) {
        return rejected("skipped", `${ url } is disabled`);
    }
    if (source.channel !== channel) {
        return rejected("skipped", `${ url } belongs to ${ source.channel }`);
    }
    if (!isPackageFile(url)) {
        return rejected("invalid", `${ url } does not end with ${ PACKAGE_SUFFIX }`);
    }
    if (!URL.canParse(url)) {
        return rejected("invalid", `${ url } is not a valid URL`);
    }
    const filename = filenameFromUrl(url);
    if (!filename || filename === PACKAGE_SUFFIX) {
        return rejected("invalid", `${ url } has no file name`);
    }
    if (!isPlainFilename(filename)) {
        return rejected("invalid", `${ url } has an unsafe file name ${ filename }`);
    }
    return accepted({ filename, sourceUrl: url, channel, kind: "direct" });
}

export function logRejections(outcomes: SourceOutcome[]): void {
    for (const outcome of outcomes) {
        if (outcome.status === "rejected") {
            const { kind, reason } = outcome.rejection;
            logger.log(kind === "invalid" ? "warn" : "debug", `Ignoring remote URL: ${ reason }`);
        }
    }
}

/**
 * Resolves the remote URLs of the active channel into packages. Entries that do not apply are
 * dropped and logged.
 */
export function resolveDirectSources(sources: DirectSource[], channel: Channel): ResolvedPackage[] {
    const outcomes = sources.map((source) => resolveDirectSource(source, channel));
    logRejections(outcomes);
    const packages = acceptedValues(outcomes);
    for (const pkg of packages) {
        logger.verbose(`Added remote package: ${ pkg.filename }`);
    }
    logger.info(`Found ${ packages.length } packages from remote URLs`);
    return packages;
}
