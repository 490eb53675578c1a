// src/lib/distributionFs.ts
// Node-only snapshot source; the browser bundle never imports this file.
import fs from "node:fs/promises";
import type { DistributionSource } from "./distributionCache";

const isMissing = (err: unknown) =>
  err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");

export const fsDistributionSource: DistributionSource = {
  async stat(path) {
    try {
      const st = await fs.stat(path);
      return st.mtimeMs;
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  },
  read(path) {
    return fs.readFile(path, "utf-8");
  },
};
