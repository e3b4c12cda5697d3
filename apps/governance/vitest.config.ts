import swc from "unplugin-swc";
import { defineConfig, mergeConfig } from "vitest/config";

import sharedConfig from "../../vitest.shared";

export default mergeConfig(
  sharedConfig,
  defineConfig({
    test: {
      name: "governance",
      include: ["src/**/*.test.ts", "test/**/*.test.ts"],
      root: __dirname,
      env: {
        NODE_ENV: "test",
        LOG_FORMAT: "text",
      },
    },
    plugins: [
      swc.vite({
        jsc: {
          parser: {
            syntax: "typescript",
            decorators: true,
          },
          transform: {
            decoratorMetadata: true,
            legacyDecorator: true,
          },
        },
      }),
    ],
  }),
);
