import { google } from "googleapis";
import { config } from "./config.js";
import { IdentityProvider } from "./credential-store.js";
import { Credential } from "./types.js";
import { nowIso } from "./utils.js";
import { toUpstreamError, upstreamStatusOf, withTimeout } from "./upstream.js";

export const CALENDAR_SCOPES = ["https://www.googleapis.com/auth/calendar.events"];

export interface GoogleOAuthOptions {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  timeoutMs?: number;
}

interface TokenSet {
  access_token?: string | null;
  refresh_token?: string | null;
  expiry_date?: number | null;
  scope?: string | null;
}

export class GoogleOAuthService implements IdentityProvider {
  private readonly clientId: string | undefined;
  private readonly clientSecret: string | undefined;
  private readonly redirectUri: string;
  private readonly timeoutMs: number;

  constructor(options: GoogleOAuthOptions = {}) {
    this.clientId = options.clientId ?? config.GOOGLE_CLIENT_ID;
    this.clientSecret = options.clientSecret ?? config.GOOGLE_CLIENT_SECRET;
    this.redirectUri = options.redirectUri ?? config.GOOGLE_REDIRECT_URI;
    this.timeoutMs = options.timeoutMs ?? config.UPSTREAM_TIMEOUT_MS;
  }

  isConfigured(): boolean {
    return Boolean(this.clientId && this.clientSecret);
  }

  private extractAccessToken(value: unknown): string | null {
    if (typeof value === "string" && value.trim().length > 0) {
      return value;
    }

    if (value && typeof value === "object" && "token" in value) {
      const token = value.token;
      if (typeof token === "string" && token.trim().length > 0) {
        return token;
      }
    }

    return null;
  }

  private toCredential(tokens: TokenSet): Credential {
    if (!tokens.access_token) {
      throw new Error("Google did not return an access token");
    }

    return {
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token ?? undefined,
      expiresAt: tokens.expiry_date ?? null,
      scope: tokens.scope ?? undefined,
      updatedAt: nowIso()
    };
  }

  getOAuth2Client() {
    return new google.auth.OAuth2(this.clientId, this.clientSecret, this.redirectUri);
  }

  /**
   * Consent URL for a student. The student identity rides along in `state`
   * so the callback knows whose credential it is storing.
   */
  getAuthUrl(student: string): string {
    if (!this.isConfigured()) {
      throw new Error("Google OAuth credentials not configured");
    }

    return this.getOAuth2Client().generateAuthUrl({
      access_type: "offline",
      include_granted_scopes: true,
      prompt: "consent",
      scope: CALENDAR_SCOPES,
      login_hint: student,
      state: student
    });
  }

  async exchangeCode(code: string): Promise<Credential> {
    if (!this.isConfigured()) {
      throw new Error("Google OAuth credentials not configured");
    }

    const oauth2Client = this.getOAuth2Client();

    try {
      const { tokens } = await withTimeout(oauth2Client.getToken(code), this.timeoutMs, "Google token exchange");
      return this.toCredential(tokens);
    } catch (error) {
      console.error("[google-oauth] authorization code exchange failed", error);
      throw toUpstreamError(error, "Google token exchange");
    }
  }

  async refresh(refreshToken: string): Promise<Credential> {
    const oauth2Client = this.getOAuth2Client();
    oauth2Client.setCredentials({ refresh_token: refreshToken });

    let accessToken: string | null;
    try {
      const response = await withTimeout(oauth2Client.getAccessToken(), this.timeoutMs, "Google token refresh");
      accessToken = this.extractAccessToken(response);
    } catch (error) {
      const status = upstreamStatusOf(error);
      // 4xx means Google rejected the grant; anything else is transient.
      if (status !== undefined && status >= 400 && status < 500) {
        throw error;
      }
      throw toUpstreamError(error, "Google token refresh");
    }

    if (!accessToken) {
      throw new Error("Google token refresh returned no access token");
    }

    return this.toCredential({
      ...oauth2Client.credentials,
      access_token: accessToken
    });
  }
}
