import { timingSafeEqual } from "crypto";
import { Logger, SimRequest } from "../types";

export const AUTHORIZATION_HEADER = "authorization";
export const API_KEY_HEADER = "api-key";
export const SUBSCRIPTION_KEY_HEADER = "ocp-apim-subscription-key";

export type CredentialCarrier = "bearer" | "api-key" | "subscription-key";

export type AuthResult = { ok: true; carrier: CredentialCarrier } | { ok: false };

/**
 * Gate applied before any other processing. Carriers are tried in a fixed order:
 * the authorization header is trusted as-is (the upstream gateway validates it),
 * while `api-key` and `ocp-apim-subscription-key` must match the shared secret.
 */
export class CredentialValidator {
  constructor(private readonly secret: string, private readonly logger: Logger) {}

  validate(req: Pick<SimRequest, "headers">): AuthResult {
    if (req.headers[AUTHORIZATION_HEADER]) {
      this.logger.debug("authorization header provided, accepting delegated credential");
      return { ok: true, carrier: "bearer" };
    }
    if (this.matches(req.headers[API_KEY_HEADER])) {
      return { ok: true, carrier: "api-key" };
    }
    if (this.matches(req.headers[SUBSCRIPTION_KEY_HEADER])) {
      return { ok: true, carrier: "subscription-key" };
    }

    this.logger.warn("missing or incorrect API key provided");
    return { ok: false };
  }

  private matches(candidate: string | undefined): boolean {
    if (!candidate) return false;
    const a = Buffer.from(candidate, "utf8");
    const b = Buffer.from(this.secret, "utf8");
    // timingSafeEqual requires equal lengths; compare against itself to keep the timing flat
    if (a.length !== b.length) {
      timingSafeEqual(b, b);
      return false;
    }
    return timingSafeEqual(a, b);
  }
}
