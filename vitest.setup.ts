import "reflect-metadata";

process.env.METRICS_DISABLED ??= "true";
process.env.LOG_LEVEL ??= "silent";
