import fs from "node:fs/promises";
import osPath from "path";
import express from "express";
import dedent from "dedent";
import { type RunConfig, resolveRunConfig } from "../../src/lib/config";
import type { ForgeClient } from "../../src/lib/gitlab";
import { runClean, runStatus, runSync } from "../../src/lib/modes";
import { mockTools, pacmanInfo, succeed, type ToolHandler } from "../mocks";
import { createFiles, listDir, readText, startServer, withTmpDir } from "../utils";
import { jest } from "@jest/globals";

jest.mock("node:child_process", () => ({ spawn: jest.fn() }));

function testConfig(dir: string, testing = false): RunConfig {
    return resolveRunConfig({
        repoArchDir: osPath.join(dir, "repo"),
        apiDir: osPath.join(dir, "api"),
        config: osPath.join(dir, "packages_config.yaml"),
        gitlabToken: "test-secret",
        testing,
    }, {});
}

const tools: ToolHandler = async (executable, args, cwd) => {
    if (executable === "repo-add") {
        await fs.writeFile(osPath.join(cwd ?? "", args[0]), `db of ${ args.length - 1 }`);
        await fs.writeFile(osPath.join(cwd ?? "", args[0].replace(".db.", ".files.")), "files");
        return succeed();
    }
    const filename = osPath.basename(args[1]);
    return succeed(pacmanInfo({
        "Name": filename.split("-")[0],
        "Version": "1.0-1",
        "Architecture": "x86_64",
    }));
};

const forgeClient: ForgeClient = {
    listReleases: async () => [
        {
            name: "v2",
            tagName: "v2",
            createdAt: "2024-02-01T00:00:00Z",
            assets: [{ name: "forge-2.0-1-x86_64.pkg.tar.zst", url: "https://forge.test/forge-2.0-1-x86_64.pkg.tar.zst" }],
        },
        {
            name: "v1",
            tagName: "v1",
            createdAt: "2024-01-01T00:00:00Z",
            assets: [{ name: "forge-1.0-1-x86_64.pkg.tar.zst", url: "https://forge.test/forge-1.0-1-x86_64.pkg.tar.zst" }],
        },
    ],
};

const CONFIG = dedent`
    forge_projects:
      - id: "7"
        name: forge
        channels: [stable, testing]
        enabled: true
    remote_urls:
      - url: https://mirror.test/direct-1.0-1-x86_64.pkg.tar.zst
        channel: stable
        enabled: true
      - url: https://mirror.test/broken-1.0-1-x86_64.pkg.tar.zst
        channel: stable
        enabled: true
      - url: https://mirror.test/beta-1.0-1-x86_64.pkg.tar.zst
        channel: testing
        enabled: true
`;

async function fakeDownload(url: string, target: string): Promise<void> {
    if (url.includes("broken")) {
        throw new Error(`Bad status for ${ url }: 404 Not Found`);
    }
    await fs.writeFile(target, url);
}

describe("Test sync mode", () => {
    test("Check channel directory follows the configuration", withTmpDir(async (dir) => {
        await createFiles(dir, {
            "packages_config.yaml": CONFIG,
            "repo/old-0.1-1-x86_64.pkg.tar.zst": "old",
        });
        const calls = mockTools(tools);
        const config = testConfig(dir);

        const report = await runSync(config, { forgeClient, download: fakeDownload });

        expect(report).toEqual({
            status: "synced",
            desired: 3,
            removed: ["old-0.1-1-x86_64.pkg.tar.zst"],
            downloads: {
                downloaded: ["forge-1.0-1-x86_64.pkg.tar.zst", "direct-1.0-1-x86_64.pkg.tar.zst"],
                failed: ["broken-1.0-1-x86_64.pkg.tar.zst"],
            },
            database: {
                names: {
                    db: "custom.db",
                    dbArchive: "custom.db.tar.gz",
                    files: "custom.files",
                    filesArchive: "custom.files.tar.gz",
                },
                packages: 2,
                empty: false,
                linked: true,
            },
            metadata: 2,
        });
        expect(await listDir(config.repoArchDir)).toEqual([
            "custom.db",
            "custom.db.tar.gz",
            "custom.files",
            "custom.files.tar.gz",
            "direct-1.0-1-x86_64.pkg.tar.zst",
            "forge-1.0-1-x86_64.pkg.tar.zst",
        ]);
        expect(calls[0]).toEqual({
            executable: "repo-add",
            args: ["custom.db.tar.gz", "direct-1.0-1-x86_64.pkg.tar.zst", "forge-1.0-1-x86_64.pkg.tar.zst"],
            cwd: config.repoArchDir,
        });
        const metadata: unknown = JSON.parse(await readText(osPath.join(dir, "api", "stable.json")));
        expect(metadata).toEqual([
            expect.objectContaining({ name: "direct", filename: "direct-1.0-1-x86_64.pkg.tar.zst", channel: "stable" }),
            expect.objectContaining({ name: "forge", filename: "forge-1.0-1-x86_64.pkg.tar.zst", channel: "stable" }),
        ]);
    }));

    test("Check testing channel takes the latest release", withTmpDir(async (dir) => {
        await createFiles(dir, { "packages_config.yaml": CONFIG });
        mockTools(tools);
        const config = testConfig(dir, true);

        const report = await runSync(config, { forgeClient, download: fakeDownload });

        expect(report).toMatchObject({
            status: "synced",
            desired: 2,
            downloads: { downloaded: ["forge-2.0-1-x86_64.pkg.tar.zst", "beta-1.0-1-x86_64.pkg.tar.zst"], failed: [] },
        });
        expect(await listDir(config.repoArchDir)).toEqual([
            "beta-1.0-1-x86_64.pkg.tar.zst",
            "custom-testing.db",
            "custom-testing.db.tar.gz",
            "custom-testing.files",
            "custom-testing.files.tar.gz",
            "forge-2.0-1-x86_64.pkg.tar.zst",
        ]);
        expect(osPath.join(dir, "api", "testing.json")).toPathExist();
    }));

    test("Check second run changes nothing", withTmpDir(async (dir) => {
        await createFiles(dir, { "packages_config.yaml": CONFIG });
        mockTools(tools);
        const config = testConfig(dir);
        await runSync(config, { forgeClient, download: fakeDownload });
        const firstMetadata = await readText(osPath.join(dir, "api", "stable.json"));

        const report = await runSync(config, { forgeClient, download: fakeDownload });

        expect(report).toMatchObject({
            removed: [],
            downloads: { downloaded: [], failed: ["broken-1.0-1-x86_64.pkg.tar.zst"] },
        });
        expect(await readText(osPath.join(dir, "api", "stable.json"))).toEqual(firstMetadata);
    }));

    test("Check remote URLs are downloaded over HTTP without a token", withTmpDir(async (dir) => {
        const app = express();
        app.get("/pkgs/web-1.0-1-x86_64.pkg.tar.zst", (_req, res) => {
            res.send("web package");
        });
        const server = await startServer(app);
        try {
            await createFiles(dir, {
                "packages_config.yaml": dedent`
                    forge_projects:
                      - id: "7"
                        name: forge
                        channels: [stable]
                        enabled: true
                    remote_urls:
                      - url: ${ server.baseUrl }/pkgs/web-1.0-1-x86_64.pkg.tar.zst
                        channel: stable
                        enabled: true
                      - url: ${ server.baseUrl }/pkgs/gone-1.0-1-x86_64.pkg.tar.zst
                        channel: stable
                        enabled: true
                `,
            });
            mockTools(tools);
            const config = { ...testConfig(dir), gitlab: { apiUrl: "https://gitlab.invalid/api/v4" } };

            const report = await runSync(config);

            expect(report).toMatchObject({
                status: "synced",
                desired: 2,
                downloads: {
                    downloaded: ["web-1.0-1-x86_64.pkg.tar.zst"],
                    failed: ["gone-1.0-1-x86_64.pkg.tar.zst"],
                },
                metadata: 1,
            });
            expect(await readText(osPath.join(config.repoArchDir, "web-1.0-1-x86_64.pkg.tar.zst"))).toEqual("web package");
        } finally {
            await server.close();
        }
    }));

    test("Check empty configuration gives an empty repository", withTmpDir(async (dir) => {
        await createFiles(dir, { "packages_config.yaml": "remote_urls: []\n" });
        const calls = mockTools(tools);
        const config = testConfig(dir);

        const report = await runSync(config, { forgeClient, download: fakeDownload });

        expect(report).toMatchObject({ status: "synced", desired: 0, database: { empty: true }, metadata: 0 });
        expect(calls).toBeEmpty();
        expect(await readText(osPath.join(dir, "api", "stable.json"))).toEqual("[]");
        expect(osPath.join(config.repoArchDir, "custom.db")).toBeSymlinkTo("custom.db.tar.gz");
    }));

    test("Check missing configuration only writes a template", withTmpDir(async (dir) => {
        const calls = mockTools(tools);
        const config = testConfig(dir);

        const report = await runSync(config, { forgeClient, download: fakeDownload });

        expect(report).toEqual({ status: "template-created", configFile: config.configFile });
        expect(config.configFile).toPathExist();
        expect(config.repoArchDir).not.toPathExist();
        expect(calls).toBeEmpty();
    }));
});

describe("Test clean mode", () => {
    test("Check packages and database are removed", withTmpDir(async (dir) => {
        await createFiles(dir, {
            "repo/a-1.0-1-x86_64.pkg.tar.zst": "a",
            "repo/b-1.0-1-x86_64.pkg.tar.zst": "b",
            "repo/custom.db.tar.gz": "db",
            "repo/custom.files.tar.gz": "files",
            "repo/README": "kept",
            "api/stable.json": "[{}]",
        });
        await fs.symlink("custom.db.tar.gz", osPath.join(dir, "repo", "custom.db"));
        const config = testConfig(dir);

        const report = await runClean(config);

        expect(report).toEqual({
            removedPackages: ["a-1.0-1-x86_64.pkg.tar.zst", "b-1.0-1-x86_64.pkg.tar.zst"],
            removedDatabaseFiles: ["custom.db", "custom.db.tar.gz", "custom.files.tar.gz"],
            metadataFile: osPath.join(dir, "api", "stable.json"),
        });
        expect(await listDir(config.repoArchDir)).toEqual(["README"]);
        expect(await readText(osPath.join(dir, "api", "stable.json"))).toEqual("[]");
    }));

    test("Check missing directory still writes empty metadata", withTmpDir(async (dir) => {
        const config = testConfig(dir, true);

        const report = await runClean(config);

        expect(report).toEqual({
            removedPackages: [],
            removedDatabaseFiles: [],
            metadataFile: osPath.join(dir, "api", "testing.json"),
        });
        expect(await readText(osPath.join(dir, "api", "testing.json"))).toEqual("[]");
    }));
});

describe("Test status mode", () => {
    test("Check report lists packages and files", withTmpDir(async (dir) => {
        await createFiles(dir, {
            "repo/tool-1.0-1-x86_64.pkg.tar.zst": "12345",
            "repo/custom.db.tar.gz": "db",
            "api/stable.json": "[]",
            "packages_config.yaml": "remote_urls: []\n",
        });
        await fs.symlink("custom.db.tar.gz", osPath.join(dir, "repo", "custom.db"));
        const config = testConfig(dir);
        const lines: string[] = [];

        await runStatus(config, (line) => lines.push(line));

        expect(lines).toEqual([
            "=== Repository Structure ===",
            "Current mode: stable repository",
            "Database name: custom",
            `Architecture directory: ${ osPath.join(dir, "repo") }`,
            `API directory: ${ osPath.join(dir, "api") }`,
            "",
            "=== Packages in stable repository ===",
            "  tool-1.0-1-x86_64.pkg.tar.zst (5 B)",
            "  Total: 1 packages",
            "",
            "=== Database Files ===",
            "  custom.db (2 B) -> custom.db.tar.gz",
            "  custom.db.tar.gz (2 B)",
            "",
            "=== API Files ===",
            "  stable.json (2 B)",
            "  testing.json (not found)",
            "",
            `Configuration file: ${ osPath.join(dir, "packages_config.yaml") } (16 B)`,
        ]);
    }));

    test("Check report for a missing directory", withTmpDir(async (dir) => {
        const config = testConfig(dir, true);
        const lines: string[] = [];

        await runStatus(config, (line) => lines.push(line));

        expect(lines).toIncludeAllMembers([
            "Current mode: testing repository",
            "Database name: custom-testing",
            `Repository directory does not exist: ${ osPath.join(dir, "repo") }`,
            "  testing.json (not found)",
            `Configuration file: ${ osPath.join(dir, "packages_config.yaml") } (not found)`,
        ]);
        expect(lines).not.toContain("=== Packages in testing repository ===");
    }));
});
