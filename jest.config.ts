/**
 * Root Jest Configuration
 *
 * Runs every workspace's tests. Each workspace also has its own
 * jest.config.ts for standalone runs.
 */

import type { Config } from "jest";

const config: Config = {
  projects: [
    "<rootDir>/packages/shared",
    "<rootDir>/packages/logger",
    "<rootDir>/packages/cache",
    "<rootDir>/packages/db",
    "<rootDir>/apps/api",
  ],

  collectCoverageFrom: [
    "**/src/**/*.ts",
    "!**/*.d.ts",
    "!**/node_modules/**",
    "!**/dist/**",
  ],

  coverageReporters: ["text", "text-summary"],

  testEnvironment: "node",
  verbose: true,
  clearMocks: true,
};

export default config;
