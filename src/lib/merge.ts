import logger from "./logger";
import type { DesiredSet, ResolvedPackage, SourceKind } from "./repo";

/** Later kinds overwrite earlier ones when filenames collide. */
export const SOURCE_MERGE_ORDER: readonly SourceKind[] = ["forge", "direct"];

export type PackageSets = Record<SourceKind, ResolvedPackage[]>;

export function mergePackageSets(sets: PackageSets, order: readonly SourceKind[] = SOURCE_MERGE_ORDER): DesiredSet {
    const desired: DesiredSet = new Map();
    for (const kind of order) {
        for (const pkg of sets[kind]) {
            const previous = desired.get(pkg.filename);
            if (previous) {
                logger.verbose(`${ pkg.filename }: ${ kind } source ${ pkg.sourceUrl } replaces ${
                    previous.kind } source ${ previous.sourceUrl }`);
            }
            desired.set(pkg.filename, pkg);
        }
    }
    logger.info(`Found ${ desired.size } packages total`);
    return desired;
}
