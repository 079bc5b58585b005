import fs from "node:fs";
import { pipeline } from "node:stream/promises";
import { Readable } from "node:stream";
import axios, { isAxiosError } from "axios";
import fsExtra from "fs-extra";
import { move } from "./fs";

export type Downloader = (url: string, targetPath: string) => Promise<void>;

function describeError(url: string, err: unknown): Error {
    if (isAxiosError(err) && err.response) {
        if (err.response.data instanceof Readable) {
            err.response.data.destroy();
        }
        return new Error(`Bad status for ${ url }: ${ err.response.status } ${ err.response.statusText }`, { cause: err });
    }
    return new Error(`Failed to get ${ url }`, { cause: err });
}

/**
 * Streams the body of a plain GET into `targetPath`. The body goes to a `.part` file first, which
 * is removed again when anything fails.
 */
export const downloadFile: Downloader = async (url, targetPath) => {
    const partPath = `${ targetPath }.part`;
    try {
        const response = await axios.get<Readable>(url, { responseType: "stream" });
        await pipeline(response.data, fs.createWriteStream(partPath));
        await move(partPath, targetPath);
    } catch (err) {
        await fsExtra.remove(partPath);
        throw describeError(url, err);
    }
};
