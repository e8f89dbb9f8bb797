import { readFile } from "node:fs/promises";

const PACKAGE_JSON = new URL("../../package.json", import.meta.url);

export async function resolveVersion(
  readTextFile: (url: URL) => Promise<string> = (url) => readFile(url, "utf8"),
): Promise<string> {
  try {
    const parsed: unknown = JSON.parse(await readTextFile(PACKAGE_JSON));
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
  } catch {
    return "dev";
  }
  return "dev";
}

export interface VersionDisplayParts {
  kind: "production" | "preview" | "other";
  semver: string;
  channel?: string;
  raw: string;
}

export function parseVersionForDisplay(version: string): VersionDisplayParts {
  const cleaned = version.trim();
  const productionMatch = cleaned.match(/^v?(\d+\.\d+\.\d+)$/);
  if (productionMatch) {
    const [, semver] = productionMatch;
    return { kind: "production", semver, raw: semver };
  }

  const previewMatch = cleaned.match(/^v?(\d+\.\d+\.\d+)-([0-9A-Za-z.-]+)$/);
  if (previewMatch) {
    const [, semver, channel] = previewMatch;
    return { kind: "preview", semver, channel, raw: `${semver}-${channel}` };
  }

  return { kind: "other", semver: cleaned, raw: cleaned };
}
