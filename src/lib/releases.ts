import logger from "./logger";
import type { ForgeAsset, ForgeClient, ForgeRelease } from "./gitlab";
import {
    accepted,
    acceptedValues,
    type Channel,
    type ForgeProject,
    isPackageFile,
    isPlainFilename,
    rejected,
    type ResolvedPackage,
    type SourceOutcome,
} from "./repo";

export type ReleaseSelection =
    | { status: "selected", release: ForgeRelease, reason: string }
    | { status: "none", reason: string };

function createdAtTime(release: ForgeRelease): number {
    const time = Date.parse(release.createdAt);
    return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

export function sortReleasesByDate(releases: ForgeRelease[]): ForgeRelease[] {
    return [...releases].sort((a, b) => createdAtTime(b) - createdAtTime(a));
}

export function isDualTrack(project: ForgeProject): boolean {
    return project.channels.includes("stable") && project.channels.includes("testing");
}

/**
 * Picks the release of a project for the channel. A project published to both channels
 * gives testing its latest release and stable the release before it; stable gets nothing until
 * a second release exists.
 */
export function selectRelease(releases: ForgeRelease[], project: ForgeProject, channel: Channel): ReleaseSelection {
    const sorted = sortReleasesByDate(releases);
    if (sorted.length === 0) {
        return { status: "none", reason: "no releases" };
    }
    if (!isDualTrack(project)) {
        return { status: "selected", release: sorted[0], reason: "latest release (single channel)" };
    }
    if (channel === "testing") {
        return { status: "selected", release: sorted[0], reason: "latest release for testing" };
    }
    if (sorted.length > 1) {
        return { status: "selected", release: sorted[1], reason: "previous release for stable" };
    }
    return { status: "none", reason: "stable needs at least 2 releases" };
}

export function isEncryptedUrl(url: string): boolean {
    return URL.canParse(url) && new URL(url).protocol === "https:";
}

export function resolveAsset(asset: ForgeAsset, channel: Channel): SourceOutcome {
    if (!isPackageFile(asset.name)) {
        return rejected("skipped", `${ asset.name } is not a package`);
    }
    if (!isEncryptedUrl(asset.url)) {
        return rejected("skipped", `${ asset.name } is not served over https`);
    }
    if (!isPlainFilename(asset.name)) {
        return rejected("invalid", `${ asset.name } is not a plain file name`);
    }
    return accepted({ filename: asset.name, sourceUrl: asset.url, channel, kind: "forge" });
}

export function releasePackages(release: ForgeRelease, channel: Channel): ResolvedPackage[] {
    const outcomes = release.assets.map((asset) => resolveAsset(asset, channel));
    for (const outcome of outcomes) {
        if (outcome.status === "rejected") {
            const { kind, reason } = outcome.rejection;
            logger.log(kind === "invalid" ? "warn" : "debug", `Ignoring asset of ${ release.name }: ${ reason }`);
        }
    }
    return acceptedValues(outcomes);
}

export function isProjectEligible(project: ForgeProject, channel: Channel): boolean {
    return project.enabled && project.channels.includes(channel);
}

/**
 * Resolves one project into packages. Failures only cost this project its packages.
 */
export async function resolveForgeProject(client: ForgeClient, project: ForgeProject,
    channel: Channel): Promise<ResolvedPackage[]> {
    logger.verbose(`Fetching releases for project: ${ project.name } (${ project.id })`);

    let releases: ForgeRelease[];
    try {
        releases = await client.listReleases(project.id);
    } catch (err) {
        logger.warn(`Failed to fetch releases for project ${ project.name } (${ project.id })`, { err });
        return [];
    }

    const selection = selectRelease(releases, project, channel);
    if (selection.status === "none") {
        const level = releases.length === 0 ? "warn" : "verbose";
        logger.log(level, `Skipping project ${ project.name }: ${ selection.reason }`);
        return [];
    }

    logger.verbose(`Using ${ selection.reason }: ${ selection.release.name }`);
    const packages = releasePackages(selection.release, channel);
    for (const pkg of packages) {
        logger.verbose(`Added package: ${ pkg.filename } from ${ selection.release.name }`);
    }
    return packages;
}

export async function resolveForgeProjects(client: ForgeClient | undefined, projects: ForgeProject[],
    channel: Channel): Promise<ResolvedPackage[]> {
    const eligible = projects.filter((project) => isProjectEligible(project, channel));
    if (!client) {
        if (eligible.length > 0) {
            logger.warn(`No GitLab token available, skipping ${ eligible.length } forge projects`);
        }
        return [];
    }

    const packages: ResolvedPackage[] = [];
    for (const project of eligible) {
        packages.push(...await resolveForgeProject(client, project, channel));
    }
    logger.info(`Found ${ packages.length } packages from forge projects`);
    return packages;
}
