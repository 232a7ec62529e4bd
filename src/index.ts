#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { runReview } from "./action/run.js";
import { logger } from "./logger.js";

async function main(): Promise<number> {
    const config = loadConfig();

    logger.info("Starting PR review agent", {
        provider: config.provider,
        model: config.review.model,
    });

    return runReview(config, process.env);
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err) => {
        if (err instanceof ConfigError) {
            logger.error("Invalid configuration", { issues: err.issues });
        } else {
            logger.error("Failed to run review", { error: String(err) });
        }
        process.exitCode = 1;
    });
