import { jest, describe, it, expect, beforeEach } from "@jest/globals";
import { AuthenticationNegotiator, WORKSTATION_HEADER } from "../src/auth/AuthenticationNegotiator";
import { AuthHandler, BasicAuthHandler, DomainBasicAuthHandler, parseChallengeSchemes } from "../src/auth/AuthHandler";

jest.mock("../src/util/logger", () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const decode = (authorization: string | undefined): string =>
  Buffer.from((authorization ?? "").replace(/^Basic /, ""), "base64").toString("utf8");

const tokenHandler = (overrides: Partial<AuthHandler> = {}): AuthHandler => ({
  scheme: "Bearer",
  canHandle: (scheme: string) => scheme.toLowerCase() === "bearer",
  preemptiveValue: () => "Bearer test-token",
  handleChallenge: async () => "Bearer refreshed-token",
  ...overrides,
});

describe("AuthenticationNegotiator", () => {
  let negotiator: AuthenticationNegotiator;

  beforeEach(() => {
    negotiator = new AuthenticationNegotiator();
  });

  it("sends nothing without credentials", async () => {
    expect(negotiator.headersForRequest("http://h/dav/")).toEqual({});
    expect(await negotiator.respondToChallenge("http://h/dav/", { "www-authenticate": "Basic" })).toBeUndefined();
  });

  it("qualifies the user with the domain and sends the workstation", () => {
    negotiator.setCredentialsWithDomain("u", "p", "DOM", "WS", true);

    const headers = negotiator.headersForRequest("http://h/dav/");
    expect(decode(headers.Authorization)).toBe("DOM\\u:p");
    expect(headers[WORKSTATION_HEADER]).toBe("WS");
    expect(negotiator.state).toEqual({
      mode: "credentials",
      preemptive: true,
      preemptiveScope: undefined,
      workstation: "WS",
    });
  });

  it("sends no workstation header for plain credentials", () => {
    negotiator.setCredentials("u", "p", true);
    const headers = negotiator.headersForRequest("http://h/dav/");
    expect(headers).toEqual({ Authorization: `Basic ${Buffer.from("u:p").toString("base64")}` });
  });

  it("treats empty domain and workstation as absent", () => {
    negotiator.setCredentialsWithDomain("u", "p", "", "", true);
    const headers = negotiator.headersForRequest("http://h/");
    expect(decode(headers.Authorization)).toBe("u:p");
    expect(headers[WORKSTATION_HEADER]).toBeUndefined();
  });

  it("waits for a challenge unless preemptive", async () => {
    negotiator.setCredentials("u", "test-secret");
    expect(negotiator.headersForRequest("http://h/")).toEqual({});
    const answer = await negotiator.respondToChallenge("http://h/", { "www-authenticate": 'Basic realm="dav"' });
    expect(decode(answer)).toBe("u:test-secret");
  });

  it("limits preemptive credentials to the configured host and ports", () => {
    negotiator.setCredentials("u", "p");
    negotiator.enablePreemptiveAuthentication("Files.Example.com", [8443]);

    expect(negotiator.headersForRequest("https://files.example.com:8443/x").Authorization).toBeDefined();
    expect(negotiator.headersForRequest("https://files.example.com/x").Authorization).toBeUndefined();
    expect(negotiator.headersForRequest("https://other.example.com:8443/x").Authorization).toBeUndefined();

    negotiator.disablePreemptiveAuthentication();
    expect(negotiator.headersForRequest("https://files.example.com:8443/x")).toEqual({});
  });

  it("clears to no authentication and stays cleared", () => {
    negotiator.setCredentialsWithDomain("u", "p", "DOM", "WS", true);
    negotiator.clearAuthentication();
    negotiator.clearAuthentication();

    expect(negotiator.state).toEqual({ mode: "none", preemptive: false, preemptiveScope: undefined, workstation: undefined });
    expect(negotiator.headersForRequest("http://h/")).toEqual({});
  });

  it("uses a custom handler for the schemes it accepts", async () => {
    negotiator.setAuthenticationHandler(tokenHandler(), true);

    expect(negotiator.headersForRequest("http://h/")).toEqual({ Authorization: "Bearer test-token" });
    expect(await negotiator.respondToChallenge("http://h/", { "www-authenticate": "Bearer" })).toBe(
      "Bearer refreshed-token"
    );
    expect(await negotiator.respondToChallenge("http://h/", { "www-authenticate": "Negotiate" })).toBeUndefined();
  });

  it("does not fail when a handler throws", async () => {
    negotiator.setAuthenticationHandler(
      tokenHandler({
        handleChallenge: async () => {
          throw new Error("token service down");
        },
      })
    );
    expect(await negotiator.respondToChallenge("http://h/", { "www-authenticate": "Bearer" })).toBeUndefined();
  });
});

describe("AuthHandler", () => {
  it("lists announced challenge schemes", () => {
    expect(parseChallengeSchemes('Basic realm="a", NTLM, Negotiate')).toEqual(["Basic", "NTLM", "Negotiate"]);
    expect(parseChallengeSchemes(undefined)).toEqual([]);
  });

  it("answers Basic challenges with the domain-qualified user", async () => {
    const handler = BasicAuthHandler.withDomain("u", "p", "CORP");
    expect(handler.canHandle("BASIC")).toBe(true);
    expect(decode(await handler.handleChallenge())).toBe("CORP\\u:p");
  });

  it("sends the workstation of a domain handler with its preemptive value", () => {
    const negotiator = new AuthenticationNegotiator();
    negotiator.setAuthenticationHandler(new DomainBasicAuthHandler("u", "test-secret", "CORP", "WS-7"), true);

    const headers = negotiator.headersForRequest("http://h/a");

    expect(headers[WORKSTATION_HEADER]).toBe("WS-7");
    expect(decode(headers.Authorization)).toBe("CORP\\u:test-secret");
    expect(negotiator.state.workstation).toBe("WS-7");
  });
});
