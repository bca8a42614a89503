import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, writeFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";

import { joinRepoPath } from "../../src/coverage/paths.js";
import { loadTaxonomy, matchSupportedFile, parseTaxonomy } from "../../src/coverage/taxonomy.js";
import { FileCoverageValidator, computeCoverage } from "../../src/coverage/validator.js";
import { GitLabRepositoryHost, LocalRepositoryHost } from "../../src/coverage/hosts.js";
import { identityFromFullPath, resolveRepoIdentity } from "../../src/identity/resolver.js";
import { FileCheckError } from "../../src/errors/audit.errors.js";
import type { RepoIdentity } from "../../src/schema/types.js";
import { FakeHostApi } from "../fixtures/apis.js";

// ── Helpers ──

function makeTmpDir(): string {
  const dir = join(tmpdir(), `scan-drift-test-${randomUUID()}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

function writeFixture(root: string, relativePath: string, content = ""): void {
  const abs = join(root, relativePath);
  mkdirSync(join(abs, ".."), { recursive: true });
  writeFileSync(abs, content, "utf8");
}

function gitlabIdentity(fullPath: string, branch = "main"): RepoIdentity {
  const id = identityFromFullPath("gitlab.com", fullPath, branch);
  if (!id) throw new Error(`bad fixture path ${fullPath}`);
  return id;
}

// ────────────────────────────────────────────────────────────────
// 1. joinRepoPath
// ────────────────────────────────────────────────────────────────

describe("joinRepoPath", () => {
  it("joins root and file", () => {
    expect(joinRepoPath("services/api", "package.json")).toBe("services/api/package.json");
  });

  it("leaves a file that already starts with the root alone", () => {
    expect(joinRepoPath("services/api", "services/api/package.json")).toBe("services/api/package.json");
  });

  it("converts backslashes and trims slashes and dot segments", () => {
    expect(joinRepoPath("", "\\backend\\./pom.xml/")).toBe("backend/pom.xml");
    expect(joinRepoPath("/", "/go.mod")).toBe("go.mod");
  });
});

// ────────────────────────────────────────────────────────────────
// 2. Taxonomy
// ────────────────────────────────────────────────────────────────

describe("supported-file taxonomy", () => {
  const patterns = loadTaxonomy();

  it("matches exact basenames case-insensitively", () => {
    expect(matchSupportedFile("web/PACKAGE.JSON", patterns)).toEqual({
      path: "web/PACKAGE.JSON",
      category: "manifest",
      tag: "npm",
    });
    expect(matchSupportedFile("Dockerfile", patterns)?.category).toBe("container");
  });

  it("matches suffix patterns", () => {
    expect(matchSupportedFile("src/App/App.csproj", patterns)?.tag).toBe("nuget");
    expect(matchSupportedFile("infra/main.tf", patterns)?.category).toBe("iac");
  });

  it("rejects unsupported files", () => {
    expect(matchSupportedFile("README.md", patterns)).toBeNull();
    expect(matchSupportedFile("package.json.bak", patterns)).toBeNull();
  });

  it("validates taxonomy entries", () => {
    expect(() => parseTaxonomy([{ pattern: "x", category: "binary", tag: "y" }])).toThrow();
  });
});

// ────────────────────────────────────────────────────────────────
// 3. computeCoverage
// ────────────────────────────────────────────────────────────────

describe("computeCoverage", () => {
  it("keeps tracked, stale and untracked apart", () => {
    const sets = computeCoverage(
      [
        { path: "package.json", exists: true, root: "" },
        { path: "old/requirements.txt", exists: false, root: "" },
        { path: "package.json", exists: true, root: "" },
      ],
      [
        { path: "go.mod", category: "manifest", tag: "gomodules" },
        { path: "package.json", category: "manifest", tag: "npm" },
        { path: "Dockerfile", category: "container", tag: "dockerfile" },
      ]
    );
    expect(sets).toEqual({
      tracked: ["package.json"],
      stale: ["old/requirements.txt"],
      untracked: [
        { path: "Dockerfile", category: "container", tag: "dockerfile" },
        { path: "go.mod", category: "manifest", tag: "gomodules" },
      ],
    });
  });

  it("never lists a declared file as untracked", () => {
    const sets = computeCoverage(
      [{ path: "pom.xml", exists: false, root: "" }],
      [{ path: "pom.xml", category: "manifest", tag: "maven" }]
    );
    expect(sets).toEqual({ tracked: [], stale: ["pom.xml"], untracked: [] });
  });

  it("keeps declared files whose check failed out of every set", () => {
    const sets = computeCoverage(
      [{ path: "package.json", exists: true, root: "" }],
      [
        { path: "package.json", category: "manifest", tag: "npm" },
        { path: "api/requirements.txt", category: "manifest", tag: "pip" },
      ],
      ["api/requirements.txt"]
    );
    expect(sets).toEqual({ tracked: ["package.json"], stale: [], untracked: [] });
  });
});

// ────────────────────────────────────────────────────────────────
// 4. FileCoverageValidator — remote host
// ────────────────────────────────────────────────────────────────

describe("FileCoverageValidator with GitLabRepositoryHost", () => {
  it("checks files on the identity's branch with the root applied", async () => {
    const api = new FakeHostApi();
    api.files.set("group/repo", ["api/package.json"]);
    const validator = new FileCoverageValidator({ hosts: [new GitLabRepositoryHost(api)] });

    const check = await validator.validateFile(gitlabIdentity("group/repo", "develop"), "package.json", "api");
    expect(check).toEqual({ path: "api/package.json", exists: true, root: "api" });
    expect(api.checks).toEqual([{ fullPath: "group/repo", path: "api/package.json", ref: "develop" }]);
  });

  it("raises FileCheckError instead of reporting a failed check as missing", async () => {
    const api = new FakeHostApi();
    api.brokenPaths.add("pom.xml");
    const validator = new FileCoverageValidator({ hosts: [new GitLabRepositoryHost(api)] });

    await expect(validator.validateFile(gitlabIdentity("group/repo"), "pom.xml")).rejects.toBeInstanceOf(FileCheckError);
  });

  it("scans the tree for supported files", async () => {
    const api = new FakeHostApi();
    api.files.set("group/repo", ["src/index.ts", "package.json", "deploy/Dockerfile", "README.md"]);
    const validator = new FileCoverageValidator({ hosts: [new GitLabRepositoryHost(api)] });

    const files = await validator.scanRepositoryForSupportedFiles(gitlabIdentity("group/repo"));
    expect(files.map((f) => f.path)).toEqual(["deploy/Dockerfile", "package.json"]);
  });

  it("raises FileCheckError when the tree is inaccessible", async () => {
    const validator = new FileCoverageValidator({ hosts: [new GitLabRepositoryHost(new FakeHostApi())] });
    await expect(validator.scanRepositoryForSupportedFiles(gitlabIdentity("group/gone"))).rejects.toThrow(
      "Could not check <tree> in gitlab.com/group/gone: repository tree is not accessible (HTTP 404)"
    );
  });

  it("refuses identities no host serves", async () => {
    const validator = new FileCoverageValidator({ hosts: [new GitLabRepositoryHost(new FakeHostApi())] });
    const github = resolveRepoIdentity("https://github.com/acme/widgets");
    if (!github) throw new Error("fixture did not resolve");
    await expect(validator.validateFile(github, "package.json")).rejects.toBeInstanceOf(FileCheckError);
  });
});

// ────────────────────────────────────────────────────────────────
// 5. FileCoverageValidator — local checkout
// ────────────────────────────────────────────────────────────────

describe("FileCoverageValidator with LocalRepositoryHost", () => {
  let root: string;

  beforeEach(() => {
    root = makeTmpDir();
    writeFixture(root, "package.json", "{}");
    writeFixture(root, "services/api/requirements.txt", "flask\n");
    writeFixture(root, "node_modules/dep/package.json", "{}");
    writeFixture(root, ".git/config");
    writeFixture(root, "docs/guide.md");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function localIdentity(): RepoIdentity {
    const id = resolveRepoIdentity(root);
    if (!id) throw new Error("temp dir did not resolve");
    return id;
  }

  it("checks existence on disk", async () => {
    const validator = new FileCoverageValidator({ hosts: [new LocalRepositoryHost()] });
    expect((await validator.validateFile(localIdentity(), "package.json")).exists).toBe(true);
    expect((await validator.validateFile(localIdentity(), "requirements.txt", "services/api")).exists).toBe(true);
    expect((await validator.validateFile(localIdentity(), "go.mod")).exists).toBe(false);
  });

  it("scans the checkout, skipping .git and node_modules", async () => {
    const validator = new FileCoverageValidator({ hosts: [new LocalRepositoryHost()] });
    const files = await validator.scanRepositoryForSupportedFiles(localIdentity());
    expect(files).toEqual([
      { path: "package.json", category: "manifest", tag: "npm" },
      { path: "services/api/requirements.txt", category: "manifest", tag: "pip" },
    ]);
  });
});
