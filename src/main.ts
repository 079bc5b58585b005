#!/usr/bin/env node
import "dotenv/config";
import logger from "./lib/logger";
import { createProgram } from "./cli/program";

createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
        logger.error("Run failed", { err });
        process.exitCode = 1;
    });
