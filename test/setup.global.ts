/**
 * ---- TEST ENVIRONMENT ----
 * Runs before every test file, ahead of the logger reading its level.
 */
process.env.NODE_ENV = process.env.NODE_ENV || "test";
process.env.LOG_LEVEL = process.env.LOG_LEVEL || "silent";
process.env.VITEST = "true";
