import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { createServer } from "node:http";
import { google, type Auth } from "googleapis";
import { GatewayError, errorMessage } from "@schedule-sync/core";

export const CALENDAR_SCOPES = ["https://www.googleapis.com/auth/calendar"];
export const DEFAULT_CREDENTIALS_PATH = "credentials.json";
export const DEFAULT_TOKEN_PATH = "token.json";
export const DEFAULT_AUTH_PORT = 8080;

export type AuthOptions = {
  credentialsPath: string;
  tokenPath: string;
  serviceAccountKeyPath?: string;
  port: number;
};

export type ClientSecrets = {
  clientId: string;
  clientSecret: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new GatewayError(`Cannot read ${path}: ${errorMessage(error)}`, error);
  }
}

/** Accepts the "installed" and "web" client files the Google Cloud console hands out. */
export function readClientSecrets(raw: unknown): ClientSecrets {
  const section = isRecord(raw) ? raw.installed ?? raw.web : undefined;
  if (!isRecord(section) || typeof section.client_id !== "string" || typeof section.client_secret !== "string") {
    throw new GatewayError("OAuth client file must contain installed.client_id and installed.client_secret");
  }
  return { clientId: section.client_id, clientSecret: section.client_secret };
}

export function readToken(raw: unknown): Auth.Credentials {
  if (!isRecord(raw)) {
    throw new GatewayError("Stored token must be a JSON object");
  }
  const token: Auth.Credentials = {};
  if (typeof raw.access_token === "string") {
    token.access_token = raw.access_token;
  }
  if (typeof raw.refresh_token === "string") {
    token.refresh_token = raw.refresh_token;
  }
  if (typeof raw.expiry_date === "number") {
    token.expiry_date = raw.expiry_date;
  }
  if (typeof raw.token_type === "string") {
    token.token_type = raw.token_type;
  }
  if (typeof raw.scope === "string") {
    token.scope = raw.scope;
  }
  if (!token.access_token && !token.refresh_token) {
    throw new GatewayError("Stored token has neither an access token nor a refresh token; delete it to sign in again");
  }
  return token;
}

function persistToken(path: string, token: Auth.Credentials): void {
  writeFileSync(path, `${JSON.stringify(token, null, 2)}\n`, { mode: 0o600 });
}

function waitForAuthCode(port: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const server = createServer((request, response) => {
      const url = new URL(request.url ?? "/", `http://127.0.0.1:${port}`);
      const code = url.searchParams.get("code");
      const denied = url.searchParams.get("error");
      if (!code && !denied) {
        response.writeHead(404).end();
        return;
      }

      response
        .writeHead(200, { "Content-Type": "text/plain; charset=utf-8" })
        .end(code ? "Authorization received. You can close this tab." : `Authorization failed: ${denied}`);
      server.close();
      if (code) {
        resolve(code);
      } else {
        reject(new GatewayError(`Authorization was denied: ${denied}`));
      }
    });
    server.on("error", (error) => reject(new GatewayError(`Cannot listen on 127.0.0.1:${port}: ${error.message}`, error)));
    server.listen(port, "127.0.0.1");
  });
}

async function signIn(client: Auth.OAuth2Client, port: number): Promise<Auth.Credentials> {
  const url = client.generateAuthUrl({ access_type: "offline", prompt: "consent", scope: CALENDAR_SCOPES });
  console.log(`Open this URL to authorize calendar access:\n${url}`);
  const code = await waitForAuthCode(port);
  const { tokens } = await client.getToken(code);
  return tokens;
}

/** Returns a ready-to-use auth client; the sync never sees credentials beyond this point. */
export async function authorize(options: AuthOptions): Promise<Auth.GoogleAuth | Auth.OAuth2Client> {
  if (options.serviceAccountKeyPath) {
    if (!existsSync(options.serviceAccountKeyPath)) {
      throw new GatewayError(`Service account key not found: ${options.serviceAccountKeyPath}`);
    }
    return new google.auth.GoogleAuth({ keyFile: options.serviceAccountKeyPath, scopes: CALENDAR_SCOPES });
  }

  if (!existsSync(options.credentialsPath)) {
    throw new GatewayError(
      `OAuth client file not found: ${options.credentialsPath}. Pass --credentials or --service-account-key.`
    );
  }
  const secrets = readClientSecrets(readJson(options.credentialsPath));
  const client = new google.auth.OAuth2(secrets.clientId, secrets.clientSecret, `http://127.0.0.1:${options.port}`);
  client.on("tokens", (tokens) => {
    persistToken(options.tokenPath, { ...client.credentials, ...tokens });
  });

  if (existsSync(options.tokenPath)) {
    client.setCredentials(readToken(readJson(options.tokenPath)));
    return client;
  }

  const tokens = await signIn(client, options.port);
  client.setCredentials(tokens);
  persistToken(options.tokenPath, tokens);
  return client;
}
