import osPath from "path";
import express from "express";
import { downloadFile } from "../../src/lib/download";
import { listDir, readText, startServer, withTmpDir } from "../utils";

describe("Test package download", () => {
    test("Check body is written to the target", withTmpDir(async (dir) => {
        const app = express();
        app.get("/files/a.pkg.tar.zst", (_req, res) => {
            res.send("package body");
        });
        const server = await startServer(app);
        try {
            const target = osPath.join(dir, "a.pkg.tar.zst");

            await downloadFile(`${ server.baseUrl }/files/a.pkg.tar.zst`, target);

            expect(await readText(target)).toEqual("package body");
            expect(await listDir(dir)).toEqual(["a.pkg.tar.zst"]);
        } finally {
            await server.close();
        }
    }));

    test("Check bad status leaves nothing behind", withTmpDir(async (dir) => {
        const app = express();
        app.get("/files/missing.pkg.tar.zst", (_req, res) => {
            res.sendStatus(404);
        });
        const server = await startServer(app);
        try {
            const url = `${ server.baseUrl }/files/missing.pkg.tar.zst`;

            await expect(downloadFile(url, osPath.join(dir, "missing.pkg.tar.zst")))
                .rejects.toThrow(`Bad status for ${ url }: 404 Not Found`);
            expect(await listDir(dir)).toBeEmpty();
        } finally {
            await server.close();
        }
    }));

    test("Check connection dropped mid-body leaves nothing behind", withTmpDir(async (dir) => {
        const app = express();
        app.get("/files/cut.pkg.tar.zst", (_req, res) => {
            res.setHeader("Content-Length", "1000");
            res.write("only the beginning");
            setTimeout(() => res.socket?.destroy(), 50);
        });
        const server = await startServer(app);
        try {
            const url = `${ server.baseUrl }/files/cut.pkg.tar.zst`;

            await expect(downloadFile(url, osPath.join(dir, "cut.pkg.tar.zst")))
                .rejects.toThrow(`Failed to get ${ url }`);
            expect(osPath.join(dir, "cut.pkg.tar.zst")).not.toPathExist();
            expect(osPath.join(dir, "cut.pkg.tar.zst.part")).not.toPathExist();
        } finally {
            await server.close();
        }
    }));

    test("Check unreachable host is an error", withTmpDir(async (dir) => {
        const app = express();
        const server = await startServer(app);
        const url = `${ server.baseUrl }/a.pkg.tar.zst`;
        await server.close();

        await expect(downloadFile(url, osPath.join(dir, "a.pkg.tar.zst")))
            .rejects.toThrow(`Failed to get ${ url }`);
        expect(await listDir(dir)).toBeEmpty();
    }));
});
