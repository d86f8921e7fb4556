import "reflect-metadata";

if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = "silent";
}

if (!process.env.METRICS_DISABLED) {
  process.env.METRICS_DISABLED = "true";
}
