/**
 * Jest Configuration - Logger Package
 */

import type { Config } from "jest";

const config: Config = {
  displayName: "@ttlink/logger",
  preset: "ts-jest",
  testEnvironment: "node",
  rootDir: ".",
  testMatch: ["<rootDir>/__tests__/**/*.test.ts"],
  moduleNameMapper: {
    "^@ttlink/(shared|logger|db|reaper)$": "<rootDir>/../../packages/$1/src/index.ts",
    "^(\\.{1,2}/.*)\\.js$": "$1",
  },
  transform: {
    "^.+\\.ts$": ["ts-jest", { tsconfig: "<rootDir>/../../tsconfig.json" }],
  },
  clearMocks: true,
  testTimeout: 30000,
};

export default config;
