import { Command } from "commander";
import logger from "../lib/logger";
import { type CliOptions, DEFAULT_API_DIR, DEFAULT_ARCH, DEFAULT_REPO_NAME, resolveRunConfig } from "../lib/config";
import { runClean, runStatus, runSync } from "../lib/modes";

export type ModeActions = {
    sync: (options: CliOptions) => Promise<void>,
    clean: (options: CliOptions) => Promise<void>,
    status: (options: CliOptions) => Promise<void>,
};

export const defaultActions: ModeActions = {
    sync: async (options) => {
        const report = await runSync(resolveRunConfig(options));
        if (report.status === "template-created") {
            logger.info(`Nothing synced, fill in ${ report.configFile } first`);
        }
    },
    clean: async (options) => {
        await runClean(resolveRunConfig(options));
    },
    status: async (options) => {
        await runStatus(resolveRunConfig(options));
    },
};

function addCommonOptions(command: Command, testingHelp: string): Command {
    return command
        .option("--repo-name <name>", "Repository name", DEFAULT_REPO_NAME)
        .option("--arch <arch>", "Target architecture", DEFAULT_ARCH)
        .option("--repo-arch-dir <dir>", "Architecture-specific repository directory (default: <arch> or testing/<arch>)")
        .option("--api-dir <dir>", "Directory for the JSON metadata", DEFAULT_API_DIR)
        .option("--config <file>", "Packages configuration file (default: $PACKAGES_CONFIG or packages_config.yaml)")
        .option("--gitlab-token <token>", "GitLab token (overrides $GITLAB_TOKEN)")
        .option("--gitlab-url <url>", "GitLab API v4 URL (overrides $CI_API_V4_URL)")
        .option("--project-id <id>", "Project id for forge projects without one (overrides $CI_PROJECT_ID)")
        .option("--testing", testingHelp, false)
        .option("--debug", "Enable debug output", false)
        .option("--verbose", "Enable verbose output", false);
}

export function createProgram(actions: ModeActions = defaultActions): Command {
    const program = new Command();

    program
        .name("pkgrepo-sync")
        .description("Syncs packages, updates the repository database and generates metadata for the web UI")
        .enablePositionalOptions();

    addCommonOptions(program, "Use testing repository instead of stable")
        .action(async (options: CliOptions) => {
            await actions.sync(options);
        });

    addCommonOptions(program.command("clean").description("Remove all packages and repository files"),
        "Clean testing repository instead of stable")
        .action(async (options: CliOptions) => {
            await actions.clean(options);
        });

    addCommonOptions(program.command("status").description("Show repository structure and current status"),
        "Show testing repository status")
        .action(async (options: CliOptions) => {
            await actions.status(options);
        });

    return program;
}
