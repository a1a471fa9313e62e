import { describe, expect, it } from "vitest";
import { GatewayError } from "@schedule-sync/core";
import { authorize, readClientSecrets, readToken } from "../src/auth.js";

describe("credential files", () => {
  it("reads installed and web client files", () => {
    expect(readClientSecrets({ installed: { client_id: "test-client", client_secret: "test-secret" } })).toEqual({
      clientId: "test-client",
      clientSecret: "test-secret"
    });
    expect(readClientSecrets({ web: { client_id: "web-client", client_secret: "test-secret" } }).clientId).toBe("web-client");
  });

  it("rejects client files without a secret", () => {
    expect(() => readClientSecrets({ installed: { client_id: "test-client" } })).toThrow(GatewayError);
  });

  it("keeps only known token fields", () => {
    expect(readToken({ refresh_token: "test-refresh", expiry_date: 1, extra: "ignored" })).toEqual({
      refresh_token: "test-refresh",
      expiry_date: 1
    });
  });

  it("rejects a token without any usable credential", () => {
    expect(() => readToken({ token_type: "Bearer" })).toThrow(GatewayError);
  });

  it("fails setup when no credential file exists", async () => {
    await expect(
      authorize({ credentialsPath: "/nonexistent/credentials.json", tokenPath: "/nonexistent/token.json", port: 8080 })
    ).rejects.toThrow("OAuth client file not found: /nonexistent/credentials.json");
  });
});
