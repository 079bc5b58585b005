// noinspection JSUnusedGlobalSymbols

declare namespace NodeJS {
    export interface ProcessEnv {
        NODE_ENV?: 'development' | 'production' | 'test';

        LOG_LEVEL?: string;

        PACKAGES_CONFIG?: string;

        GITLAB_TOKEN?: string;
        CI_PROJECT_ID?: string;
        CI_API_V4_URL?: string;

        REPO_ADD_BIN?: string;
        PACMAN_BIN?: string;
    }
}
