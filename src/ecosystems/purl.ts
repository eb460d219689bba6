import { InvalidRequestError } from "../errors";
import type { Ecosystem, PackageIdentity } from "../types";

const PURL_TYPE_TO_ECOSYSTEM: Record<string, Ecosystem> = {
  npm: "npm",
  pypi: "pypi",
  maven: "maven",
  golang: "golang",
  cargo: "cargo",
  gem: "gem",
  nuget: "nuget",
  composer: "composer",
};

/** OSV `ecosystem` field values */
export const OSV_ECOSYSTEM: Record<Ecosystem, string | undefined> = {
  npm: "npm",
  pypi: "PyPI",
  maven: "Maven",
  golang: "Go",
  cargo: "crates.io",
  gem: "RubyGems",
  nuget: "NuGet",
  composer: "Packagist",
  generic: undefined,
};

/** GitHub advisory `ecosystem` query/response values */
export const GITHUB_ECOSYSTEM: Record<Ecosystem, string | undefined> = {
  npm: "npm",
  pypi: "pip",
  maven: "maven",
  golang: "go",
  cargo: "rust",
  gem: "rubygems",
  nuget: "nuget",
  composer: "composer",
  generic: undefined,
};

/** deps.dev `system` path segment; deps.dev covers fewer ecosystems */
export const DEPSDEV_SYSTEM: Record<Ecosystem, string | undefined> = {
  npm: "npm",
  pypi: "pypi",
  maven: "maven",
  golang: "go",
  cargo: "cargo",
  gem: undefined,
  nuget: "nuget",
  composer: undefined,
  generic: undefined,
};

export function ecosystemFromOsv(value: string): Ecosystem | undefined {
  const base = value.split(":")[0];
  for (const [eco, osv] of Object.entries(OSV_ECOSYSTEM)) {
    if (osv === base) return PURL_TYPE_TO_ECOSYSTEM[eco];
  }
  return undefined;
}

export function ecosystemFromGithub(value: string): Ecosystem | undefined {
  const v = value.toLowerCase();
  for (const [eco, gh] of Object.entries(GITHUB_ECOSYSTEM)) {
    if (gh === v) return PURL_TYPE_TO_ECOSYSTEM[eco];
  }
  return undefined;
}

function decode(segment: string, field: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new InvalidRequestError(`package_url has an invalid percent-encoding in ${field}`, { field: "package_url" });
  }
}

/**
 * Parse `pkg:<type>/<namespace>/<name>@<version>?<qualifiers>#<subpath>`.
 * Qualifiers and subpath are accepted and ignored. A version is mandatory.
 */
export function parsePurl(input: string): PackageIdentity {
  const raw = input.trim();
  const fail = (why: string): never => {
    throw new InvalidRequestError(`package_url "${input}" is malformed: ${why}`, { field: "package_url" });
  };

  if (!raw.toLowerCase().startsWith("pkg:")) fail("missing pkg: scheme");
  let rest = raw.slice(4).replace(/^\/+/, "");
  rest = rest.split("#")[0];
  rest = rest.split("?")[0];

  const at = rest.lastIndexOf("@");
  if (at < 0) fail("missing @version");
  const version = decode(rest.slice(at + 1), "version").trim();
  if (version === "") fail("empty version");
  const path = rest.slice(0, at);

  const segments = path.split("/").filter((s) => s !== "");
  if (segments.length < 2) fail("expected <type>/<name>");
  const purlType = segments[0].toLowerCase();
  if (!/^[a-z][a-z0-9.+-]*$/.test(purlType)) fail(`invalid type "${segments[0]}"`);

  const name = decode(segments[segments.length - 1], "name");
  const nsParts = segments.slice(1, -1).map((s) => decode(s, "namespace"));
  const namespace = nsParts.length > 0 ? nsParts.join("/") : undefined;
  if (name.trim() === "") fail("empty name");
  if (purlType === "maven" && !namespace) fail("maven packages need a group namespace");

  const ecosystem = PURL_TYPE_TO_ECOSYSTEM[purlType] ?? "generic";
  const canonicalPath = [purlType, ...(namespace ? namespace.split("/").map(encodeURIComponent) : []), encodeURIComponent(name)];
  return {
    ecosystem,
    purlType,
    namespace,
    name,
    version,
    purl: `pkg:${canonicalPath.join("/")}@${encodeURIComponent(version)}`,
  };
}

/** PyPI names compare after PEP 503 normalisation. */
function normalizePypi(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, "-");
}

/** Package name as advisory databases spell it for this ecosystem. */
export function advisoryPackageName(pkg: PackageIdentity): string {
  switch (pkg.ecosystem) {
    case "maven":
      return `${pkg.namespace}:${pkg.name}`;
    case "pypi":
      return normalizePypi(pkg.name);
    case "npm":
    case "golang":
    case "composer":
      return pkg.namespace ? `${pkg.namespace}/${pkg.name}` : pkg.name;
    default:
      return pkg.name;
  }
}

/** Whether a package name reported by an advisory source denotes this package. */
export function samePackage(pkg: PackageIdentity, ecosystem: Ecosystem, packageName: string): boolean {
  if (ecosystem !== pkg.ecosystem) return false;
  const expected = advisoryPackageName(pkg);
  if (pkg.ecosystem === "pypi") return normalizePypi(packageName) === expected;
  if (pkg.ecosystem === "npm" || pkg.ecosystem === "golang") return packageName === expected;
  return packageName.toLowerCase() === expected.toLowerCase();
}
