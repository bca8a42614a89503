import { describe, it, expect } from "vitest";

import { DriftAudit } from "../../src/index.js";
import { parseConfig } from "../../src/config/schema.js";
import { noopLogger } from "../../src/logging/logger.js";
import { NoOrganizationsError } from "../../src/errors/audit.errors.js";
import { FakeTransport, json, route, status } from "../fixtures/transport.js";

const SNYK = "https://api.snyk.io/rest";
const GITLAB = "https://gitlab.com/api/v4";

function gitlabTarget(id: string, url: string) {
  return {
    id,
    type: "target",
    attributes: { display_name: url.replace("https://gitlab.com/", ""), url },
    relationships: { integration: { data: { id: "int1", type: "integration", attributes: { integration_type: "gitlab" } } } },
  };
}

function transportForScenario(): FakeTransport {
  return new FakeTransport()
    .on(
      route(`${GITLAB}/projects`),
      json([{ id: 1, path_with_namespace: "group/repo1", web_url: "https://gitlab.com/group/repo1", default_branch: "main" }])
    )
    .on(route(`${GITLAB}/projects/group%2Frepo1/repository/files/package.json`, { ref: "main" }), json({}))
    .on(
      route(`${GITLAB}/projects/group%2Frepo1/repository/tree`, { ref: "main", recursive: true }),
      json([
        { path: "package.json", type: "blob" },
        { path: "Dockerfile", type: "blob" },
        { path: "src", type: "tree" },
      ])
    )
    .on(
      route(`${SNYK}/orgs/org1/targets`, { version: "2024-10-15" }),
      json({
        data: [gitlabTarget("t1", "https://gitlab.com/group/repo1"), gitlabTarget("t2", "https://gitlab.com/group/repo2")],
      })
    )
    .on(
      route(`${SNYK}/orgs/org1/targets/t1/projects`),
      json({ data: [{ id: "p1", attributes: { name: "group/repo1:package.json", target_file: "package.json" } }] })
    )
    .on(
      route(`${SNYK}/orgs/org1/projects`),
      json({
        data: [
          {
            id: "p1",
            attributes: { name: "group/repo1:package.json", target_file: "package.json" },
            relationships: { target: { data: { id: "t1" } } },
          },
        ],
      })
    )
    .on(route(`${SNYK}/orgs/org1`), json({ data: { id: "org1", attributes: { name: "Org One", slug: "org-one" } } }));
}

describe("DriftAudit", () => {
  it("runs the full reconciliation against both APIs", async () => {
    const transport = transportForScenario();
    const config = parseConfig({ snyk: { token: "test-secret", orgId: "org1" } });
    const audit = new DriftAudit(config, { transport, logger: noopLogger });

    const report = await audit.run();

    expect(report.organizations).toEqual(["org1"]);
    expect(report.counts).toEqual({
      matched: 1,
      targetOnly: 1,
      hostOnly: 0,
      unresolvable: 0,
      tracked: 1,
      stale: 0,
      untracked: 1,
      duplicates: 0,
      errors: 0,
    });
    expect(report.matched[0]?.key).toBe("gitlab.com/group/repo1");
    expect(report.matched[0]?.untracked).toEqual([{ path: "Dockerfile", category: "container", tag: "dockerfile" }]);
    expect(report.matched[0]?.details.tracked[0]?.projectUrl).toBe("https://app.snyk.io/org/org-one/project/p1");
    expect(report.targetOnly.map((t) => t.key)).toEqual(["gitlab.com/group/repo2"]);
    expect(report.catalogErrors).toEqual([]);
  });

  it("authenticates each API with its own scheme", async () => {
    const transport = transportForScenario();
    const config = parseConfig({ snyk: { token: "test-secret", orgId: "org1" }, gitlab: { token: "test-gitlab" } });
    await new DriftAudit(config, { transport, logger: noopLogger }).run();

    const snykCall = transport.requests.find((r) => r.url.startsWith(SNYK));
    const gitlabCall = transport.requests.find((r) => r.url.startsWith(GITLAB));
    expect(snykCall?.headers?.Authorization).toBe("token test-secret");
    expect(gitlabCall?.headers?.Authorization).toBe("Bearer test-gitlab");
  });

  it("fails the run when the group is inaccessible", async () => {
    const transport = new FakeTransport().on(route(`${SNYK}/groups/grp/orgs`), status(403));
    const config = parseConfig({ snyk: { token: "test-secret", groupId: "grp" } });
    const audit = new DriftAudit(config, { transport, logger: noopLogger });

    await expect(audit.run()).rejects.toBeInstanceOf(NoOrganizationsError);
  });
});
