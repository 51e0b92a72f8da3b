/**
 * Root Jest Configuration
 *
 * Runs every workspace's suite in one `npm test`. Each workspace keeps
 * its own jest.config.ts, so `npx jest --selectProjects @ttlink/db` or a
 * run from inside the workspace works too.
 */

import type { Config } from "jest";

const config: Config = {
  projects: [
    "<rootDir>/packages/shared",
    "<rootDir>/packages/logger",
    "<rootDir>/packages/db",
    "<rootDir>/packages/reaper",
    "<rootDir>/apps/redirect",
  ],

  collectCoverageFrom: [
    "**/src/**/*.ts",
    "!**/src/index.ts",
    "!**/node_modules/**",
    "!**/dist/**",
  ],
  coverageReporters: ["text", "text-summary", "lcov"],

  verbose: true,
};

export default config;
