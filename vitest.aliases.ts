/**
 * Vitest alias configuration for workspace packages.
 *
 * Aliases are ordered so that subpaths are matched before their parent packages.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export type AliasEntry = { find: string; replacement: string };

export const aliases: AliasEntry[] = [
  // ============================================
  // Subpath exports (must come before parent packages)
  // ============================================
  {
    find: "@warden/agent-runtime-telemetry/logging",
    replacement: path.resolve(__dirname, "packages/agent-runtime-telemetry/src/logging/index.ts"),
  },

  // ============================================
  // Main packages
  // ============================================
  {
    find: "@warden/agent-runtime-core",
    replacement: path.resolve(__dirname, "packages/agent-runtime-core/src/index.ts"),
  },
  {
    find: "@warden/agent-runtime-telemetry",
    replacement: path.resolve(__dirname, "packages/agent-runtime-telemetry/src/index.ts"),
  },
  {
    find: "@warden/agent-runtime-control",
    replacement: path.resolve(__dirname, "packages/agent-runtime-control/src/index.ts"),
  },
  {
    find: "@warden/agent-runtime-persistence",
    replacement: path.resolve(__dirname, "packages/agent-runtime-persistence/src/index.ts"),
  },
  {
    find: "@warden/agent-runtime-execution",
    replacement: path.resolve(__dirname, "packages/agent-runtime-execution/src/index.ts"),
  },
];
