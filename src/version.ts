import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";

const PackageManifestSchema = z.object({
  version: z.unknown().optional(),
});

type PackageManifest = z.infer<typeof PackageManifestSchema>;

interface ResolveVersionOptions {
  env?: NodeJS.ProcessEnv;
  fallbackVersion?: string;
  /** Candidate package.json locations, tried in order */
  manifestUrls?: URL[];
  readManifest?: (manifestUrl: URL) => PackageManifest | undefined;
}

// Sources run from src/, the build from dist/src/.
const DEFAULT_MANIFEST_URLS = [
  new URL("../package.json", import.meta.url),
  new URL("../../package.json", import.meta.url),
];

function normalizeVersion(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readManifestFile(manifestUrl: URL): PackageManifest | undefined {
  if (!existsSync(manifestUrl)) {
    return undefined;
  }
  const parsed = PackageManifestSchema.safeParse(
    JSON.parse(readFileSync(manifestUrl, "utf8")),
  );
  return parsed.success ? parsed.data : undefined;
}

/**
 * Version of tokenlink, from package metadata.
 *
 * Order: package.json beside the sources or the build, then
 * npm_package_version, then the fallback.
 */
export function resolveVersion(options: ResolveVersionOptions = {}): string {
  const readManifest = options.readManifest ?? readManifestFile;

  for (const manifestUrl of options.manifestUrls ?? DEFAULT_MANIFEST_URLS) {
    const manifestVersion = normalizeVersion(readManifest(manifestUrl)?.version);
    if (manifestVersion) {
      return manifestVersion;
    }
  }

  const envVersion = normalizeVersion(
    (options.env ?? process.env)["npm_package_version"],
  );
  if (envVersion) {
    return envVersion;
  }

  return normalizeVersion(options.fallbackVersion) ?? "0.0.0";
}
