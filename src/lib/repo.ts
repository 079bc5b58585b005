export const CHANNELS = ["stable", "testing"] as const;
export type Channel = typeof CHANNELS[number];

export const PACKAGE_SUFFIX = ".pkg.tar.zst";

export function isChannel(value: unknown): value is Channel {
    return value === "stable" || value === "testing";
}

export type ForgeProject = {
    id: string,
    name: string,
    channels: Channel[],
    enabled: boolean,
};

export type DirectSource = {
    url: string,
    channel: Channel,
    enabled: boolean,
};

export type SourceKind = "forge" | "direct";

export type ResolvedPackage = {
    filename: string,
    sourceUrl: string,
    channel: Channel,
    kind: SourceKind,
};

export type Rejection = {
    kind: "skipped" | "invalid",
    reason: string,
};

export type Outcome<T> =
    | { status: "accepted", value: T }
    | { status: "rejected", rejection: Rejection };

export type SourceOutcome = Outcome<ResolvedPackage>;

export function accepted<T>(value: T): Outcome<T> {
    return { status: "accepted", value };
}

export function rejected<T>(kind: Rejection["kind"], reason: string): Outcome<T> {
    return { status: "rejected", rejection: { kind, reason } };
}

export function acceptedValues<T>(outcomes: Outcome<T>[]): T[] {
    return outcomes.flatMap((outcome) => outcome.status === "accepted" ? [outcome.value] : []);
}

/** Filename to package, the set the channel directory has to match. */
export type DesiredSet = Map<string, ResolvedPackage>;

export type PackageRecord = {
    name: string,
    version: string,
    description: string,
    architecture: string,
    filename: string,
    size: string,
    modified: string,
    depends: string,
    groups: string,
    channel: Channel,
};

export type DatabaseNames = {
    db: string,
    dbArchive: string,
    files: string,
    filesArchive: string,
};

export function databaseNames(dbBaseName: string): DatabaseNames {
    return {
        db: `${ dbBaseName }.db`,
        dbArchive: `${ dbBaseName }.db.tar.gz`,
        files: `${ dbBaseName }.files`,
        filesArchive: `${ dbBaseName }.files.tar.gz`,
    };
}

export function isPackageFile(filename: string): boolean {
    return filename.endsWith(PACKAGE_SUFFIX);
}

/**
 * A name that stays inside the directory it is joined to: no separators and no `.`/`..`.
 */
export function isPlainFilename(filename: string): boolean {
    return filename !== "" && filename !== "." && !filename.includes("..") && !/[/\\]/.test(filename);
}
