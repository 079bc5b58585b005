import osPath from "path";
import untildify from "untildify";
import _ from "lodash";
import type { Channel } from "./repo";
import { isLogLevel, type LogLevel } from "./logger";

export const DEFAULT_REPO_NAME = "custom";
export const DEFAULT_ARCH = "x86_64";
export const DEFAULT_API_DIR = "api";
export const DEFAULT_CONFIG_FILE = "packages_config.yaml";
export const DEFAULT_GITLAB_URL = "https://gitlab.com/api/v4";

export type CliOptions = {
    repoName?: string,
    arch?: string,
    repoArchDir?: string,
    apiDir?: string,
    gitlabToken?: string,
    gitlabUrl?: string,
    projectId?: string,
    config?: string,
    testing?: boolean,
    debug?: boolean,
    verbose?: boolean,
};

export type Gitlab = {
    token?: string,
    apiUrl: string,
    defaultProjectId?: string,
};

export type Tools = {
    repoAdd: string,
    pacman: string,
};

export type RunConfig = {
    repoName: string,
    dbBaseName: string,
    channel: Channel,
    architecture: string,
    repoArchDir: string,
    apiDir: string,
    configFile: string,
    gitlab: Gitlab,
    tools: Tools,
    logLevel?: LogLevel,
};

function nonEmpty(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return _.isEmpty(trimmed) ? undefined : trimmed;
}

function expandPath(value: string): string {
    return untildify(value);
}

function resolveLogLevel(options: CliOptions, env: NodeJS.ProcessEnv): LogLevel | undefined {
    if (options.debug) {
        return "debug";
    }
    if (options.verbose) {
        return "verbose";
    }
    return isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : undefined;
}

/**
 * Builds the configuration of a single run. Flags win over environment variables, which win over
 * defaults. The testing channel gets its own database name and directory.
 */
export function resolveRunConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): RunConfig {
    const repoName = nonEmpty(options.repoName) ?? DEFAULT_REPO_NAME;
    const architecture = nonEmpty(options.arch) ?? DEFAULT_ARCH;
    const channel: Channel = options.testing ? "testing" : "stable";
    const dbBaseName = channel === "testing" ? `${ repoName }-testing` : repoName;
    const defaultArchDir = channel === "testing" ? osPath.join("testing", architecture) : architecture;
    const repoArchDir = expandPath(nonEmpty(options.repoArchDir) ?? defaultArchDir);
    const apiDir = expandPath(nonEmpty(options.apiDir) ?? DEFAULT_API_DIR);
    const configFile = expandPath(nonEmpty(options.config) ?? nonEmpty(env.PACKAGES_CONFIG) ?? DEFAULT_CONFIG_FILE);

    const gitlab: Gitlab = {
        token: nonEmpty(options.gitlabToken) ?? nonEmpty(env.GITLAB_TOKEN),
        apiUrl: (nonEmpty(options.gitlabUrl) ?? nonEmpty(env.CI_API_V4_URL) ?? DEFAULT_GITLAB_URL).replace(/\/+$/, ""),
        defaultProjectId: nonEmpty(options.projectId) ?? nonEmpty(env.CI_PROJECT_ID),
    };

    const tools: Tools = {
        repoAdd: env.REPO_ADD_BIN ? expandPath(env.REPO_ADD_BIN) : "repo-add",
        pacman: env.PACMAN_BIN ? expandPath(env.PACMAN_BIN) : "pacman",
    };

    return {
        repoName,
        dbBaseName,
        channel,
        architecture,
        repoArchDir,
        apiDir,
        configFile,
        gitlab,
        tools,
        logLevel: resolveLogLevel(options, env),
    };
}
