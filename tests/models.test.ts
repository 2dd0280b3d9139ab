import { describe, it, expect } from "@jest/globals";
import { DavResource } from "../src/models/DavResource";
import { DavAce, DavAcl } from "../src/models/DavAce";
import { DavQuota } from "../src/models/DavQuota";
import { DavPrincipal } from "../src/models/DavPrincipal";

describe("DavResource", () => {
  it("fills defaults and derives names from the href", () => {
    const resource = new DavResource({ href: "http://h/dav/docs/report%20v2.pdf" });

    expect(resource.status).toBe(200);
    expect(resource.contentType).toBe("application/octet-stream");
    expect(resource.contentLength).toBe(-1);
    expect(resource.path).toBe("/dav/docs/report%20v2.pdf");
    expect(resource.name).toBe("report%20v2.pdf");
    expect(resource.isFile).toBe(true);
  });

  it("treats the directory content type as a collection", () => {
    expect(new DavResource({ href: "/a/", contentType: "httpd/unix-directory" }).isDirectory).toBe(true);
    expect(new DavResource({ href: "/a/", resourceTypes: ["collection"] }).isDirectory).toBe(true);
  });

  it("cannot be changed after construction", () => {
    const resource = new DavResource({ href: "/a", customProperties: { color: "red" } });
    expect(Object.isFrozen(resource)).toBe(true);
    expect(Object.isFrozen(resource.customProperties)).toBe(true);
  });

  it("compares by href and survives JSON", () => {
    const resource = new DavResource({
      href: "/a.txt",
      etag: '"e"',
      lastModified: new Date("2024-03-01T10:00:00Z"),
      customProperties: { color: "red" },
    });
    const copy = DavResource.fromJSON(JSON.parse(JSON.stringify(resource)));

    expect(copy.equals(resource)).toBe(true);
    expect(copy.lastModified?.toISOString()).toBe("2024-03-01T10:00:00.000Z");
    expect(copy.getCustomProperty("color")).toBe("red");
    expect(copy.etag).toBe('"e"');
  });
});

describe("DavAcl", () => {
  const acl = new DavAcl([
    new DavAce({ principal: "/p/ann", privileges: ["all"] }),
    new DavAce({ principal: "/p/ann", grant: false, privileges: ["write-acl"] }),
    new DavAce({ principal: "DAV:all", privileges: ["read"], isProtected: true }),
  ]);

  it("lets deny entries win over grants", () => {
    expect(acl.hasPrivilege("/p/ann", "read")).toBe(true);
    expect(acl.hasPrivilege("/p/ann", "write-acl")).toBe(false);
    expect(acl.hasPrivilege("/p/bob", "read")).toBe(false);
  });

  it("summarizes principals and editable entries", () => {
    expect([...acl.principals]).toEqual(["/p/ann", "DAV:all"]);
    expect(acl.editableAces).toHaveLength(2);
    expect(acl.isEmpty).toBe(false);
  });

  it("compares entries by content", () => {
    const a = new DavAce({ principal: "/p/ann", privileges: ["read", "write"] });
    const b = new DavAce({ principal: "/p/ann", privileges: ["write", "read"] });
    expect(a.equals(b)).toBe(true);
    expect(a.equals(new DavAce({ principal: "/p/ann", privileges: ["read"] }))).toBe(false);
  });

  it("round-trips through JSON", () => {
    const copy = DavAcl.fromJSON(acl.toJSON());
    expect(copy.aces.map((ace) => ace.toJSON())).toEqual(acl.aces.map((ace) => ace.toJSON()));
  });
});

describe("DavQuota", () => {
  it("derives totals and usage", () => {
    const quota = new DavQuota({ availableBytes: 1024 * 1024, usedBytes: 1024 * 1024 });
    expect(quota.totalBytes).toBe(2 * 1024 * 1024);
    expect(quota.usagePercentage).toBe(0.5);
    expect(quota.isFull).toBe(false);
    expect(quota.description).toBe("1.0 MB of 2.0 MB used");
  });

  it("handles missing figures", () => {
    expect(new DavQuota({}).description).toBe("No quota information available");
    expect(new DavQuota({}).usagePercentage).toBeUndefined();
    expect(new DavQuota({ availableBytes: 0, usedBytes: 10 }).isFull).toBe(true);
    expect(new DavQuota({ availableBytes: 2048 }).description).toBe("2.0 KB available");
  });
});

describe("DavPrincipal", () => {
  it("names principals after the last path segment", () => {
    const principal = new DavPrincipal({ url: "http://h/principals/groups/staff/", type: "group" });
    expect(principal.name).toBe("staff");
    expect(principal.isGroup).toBe(true);
  });
});
