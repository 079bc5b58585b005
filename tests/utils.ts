import os from "node:os";
import fs from "fs/promises";
import osPath from "path";
import type { AddressInfo } from "node:net";
import type { Server } from "node:http";
import fsExtra from "fs-extra";
import type { Application } from "express";

export type TmpDirCallback = (dir: string) => Promise<void>;

export function withTmpDir(what: TmpDirCallback) {
    return async () => {
        const dir = await fs.mkdtemp(osPath.join(os.tmpdir(), "pkgrepo-sync-"));
        try {
            await what(dir);
        } finally {
            await fsExtra.remove(dir);
        }
    }
}

export async function createFiles(baseDir: string, files: Record<string, string | undefined>) {
    for (const [filePath, fileContent] of Object.entries(files)) {
        const fullPath = osPath.join(baseDir, filePath);
        if (fileContent === undefined) {
            await fsExtra.ensureDir(fullPath);
        } else {
            await fsExtra.ensureDir(osPath.dirname(fullPath));
            await fs.writeFile(fullPath, fileContent, "utf8");
        }
    }
}

export async function readText(filePath: string): Promise<string> {
    return await fs.readFile(filePath, "utf8");
}

export async function listDir(dir: string): Promise<string[]> {
    return (await fs.readdir(dir)).sort();
}

export type RunningServer = {
    baseUrl: string,
    close: () => Promise<void>,
};

/**
 * Serves an express app on an ephemeral localhost port.
 */
export async function startServer(app: Application): Promise<RunningServer> {
    const server = await new Promise<Server>((resolve) => {
        const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const { port } = server.address() as AddressInfo;
    return {
        baseUrl: `http://127.0.0.1:${ port }`,
        close: () => new Promise<void>((resolve, reject) => {
            server.closeAllConnections();
            server.close((err) => err ? reject(err) : resolve());
        }),
    };
}
