#!/usr/bin/env node
import { main } from "./cli.js";
import { logger } from "./config/logger.js";

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.fatal({ error: err }, "Classification run failed");
    process.exitCode = 1;
  });
