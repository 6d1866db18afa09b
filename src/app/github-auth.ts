import * as core from "@actions/core";
import { createAppAuth } from "@octokit/auth-app";

export type GithubAuth = { kind: "github-app"; token: string; appId: string } | { kind: "github-token"; token: string };

export type AppCredentials = {
  appId: string;
  privateKey: string;
  installationId: number;
};

export interface GithubAuthSources {
  getInput: (name: string) => string;
  env: Record<string, string | undefined>;
  mintInstallationToken?: (credentials: AppCredentials) => Promise<string>;
}

const APP_INPUTS = ["app-id", "app-installation-id", "app-private-key"] as const;

async function mintInstallationToken(credentials: AppCredentials): Promise<string> {
  const { token } = await createAppAuth(credentials)({ type: "installation" });
  return token;
}

/**
 * All three app inputs select GitHub App auth; none selects GITHUB_TOKEN.
 * A partial set is a configuration error rather than a silent fallback.
 */
export function readAppCredentials(getInput: (name: string) => string): AppCredentials | null {
  const values = APP_INPUTS.map((name) => getInput(name).trim());
  const missing = APP_INPUTS.filter((_, index) => !values[index]);
  if (missing.length === APP_INPUTS.length) return null;
  if (missing.length > 0) {
    throw new Error(`Incomplete GitHub App credentials: missing ${missing.join(", ")}.`);
  }

  const [appId, installationIdRaw, privateKey] = values;
  if (!/^\d+$/.test(installationIdRaw)) {
    throw new Error(`Invalid app-installation-id: ${installationIdRaw}`);
  }
  return { appId, privateKey, installationId: Number(installationIdRaw) };
}

export async function resolveGithubAuth(
  sources: GithubAuthSources = { getInput: (name) => core.getInput(name), env: process.env }
): Promise<GithubAuth> {
  const credentials = readAppCredentials(sources.getInput);
  if (credentials) {
    const mint = sources.mintInstallationToken ?? mintInstallationToken;
    return { kind: "github-app", token: await mint(credentials), appId: credentials.appId };
  }

  const token = sources.env.GITHUB_TOKEN?.trim();
  if (!token) {
    throw new Error("No GitHub credentials: set GITHUB_TOKEN or the app-id, app-installation-id and app-private-key inputs.");
  }
  return { kind: "github-token", token };
}
