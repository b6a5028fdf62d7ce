import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "packages/types",
  "packages/event-store",
  "packages/proof",
  "packages/ledger",
  "packages/disburser",
  "packages/node",
]);
