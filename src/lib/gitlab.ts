import axios, { type AxiosInstance } from "axios";
import _ from "lodash";

export type ForgeAsset = {
    name: string,
    url: string,
};

export type ForgeRelease = {
    name: string,
    tagName: string,
    createdAt: string,
    assets: ForgeAsset[],
};

export interface ForgeClient {
    listReleases(projectId: string): Promise<ForgeRelease[]>;
}

export const RELEASES_PER_PAGE = 100;

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
    return _.isPlainObject(value);
}

function stringField(record: RawRecord, key: string): string {
    const value = record[key];
    return _.isString(value) ? value : "";
}

function parseAsset(value: unknown): ForgeAsset[] {
    if (!isRecord(value)) {
        return [];
    }
    const name = stringField(value, "name");
    const url = stringField(value, "url");
    return name && url ? [{ name, url }] : [];
}

export function parseRelease(value: unknown): ForgeRelease | undefined {
    if (!isRecord(value)) {
        return undefined;
    }
    const assets = isRecord(value.assets) && Array.isArray(value.assets.links) ?
        value.assets.links.flatMap(parseAsset) :
        [];
    const tagName = stringField(value, "tag_name");
    return {
        name: stringField(value, "name") || tagName,
        tagName,
        createdAt: stringField(value, "created_at"),
        assets,
    };
}

/**
 * Lists project releases through the GitLab REST API v4.
 */
export class GitlabClient implements ForgeClient {
    private readonly http: AxiosInstance;

    public constructor(apiUrl: string, token: string) {
        this.http = axios.create({
            baseURL: apiUrl,
            headers: { "PRIVATE-TOKEN": token },
        });
    }

    public async listReleases(projectId: string): Promise<ForgeRelease[]> {
        const releases: ForgeRelease[] = [];
        for (let page = 1; ; page++) {
            const response = await this.http.get<unknown>(`/projects/${ encodeURIComponent(projectId) }/releases`, {
                params: { page, per_page: RELEASES_PER_PAGE },
            });
            if (!Array.isArray(response.data)) {
                throw new Error(`Unexpected releases response for project ${ projectId } (page ${ page })`);
            }
            if (response.data.length === 0) {
                return releases;
            }
            for (const item of response.data) {
                const release = parseRelease(item);
                if (release) {
                    releases.push(release);
                }
            }
        }
    }
}
