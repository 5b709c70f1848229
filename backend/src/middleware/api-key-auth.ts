import type { FastifyRequest, onRequestHookHandler } from "fastify";

import type { CredentialStore } from "@netops/auth";

import { HttpError } from "../lib/http-error";
import { getHeaderValue, getRequestPath } from "../lib/request-context";
import type { MetricsCollector } from "../services/metrics-collector";

const BEARER_PREFIX = "Bearer ";

export const WWW_AUTHENTICATE_CHALLENGE = 'Bearer realm="netops"';

export type AuthContext = {
  authenticated: true;
  identityDigest: string;
};

export type AuthenticationOutcome =
  | { kind: "exempt" }
  | { kind: "not-required" }
  | { kind: "missing" }
  | { kind: "invalid" }
  | { kind: "authenticated"; context: AuthContext };

export type ApiKeyAuthOptions = {
  credentials: CredentialStore;
  required: boolean;
  exemptPaths: ReadonlySet<string>;
};

const authContext = new WeakMap<FastifyRequest, AuthContext>();
const authRejections = new WeakMap<FastifyRequest, HttpError>();

/**
 * Header precedence: `Authorization: Bearer`, then `X-API-Key`, then `API-Key`.
 * The first header present with a non-empty credential wins.
 */
export const extractApiKey = (request: Pick<FastifyRequest, "headers">): string | null => {
  const authorization = getHeaderValue(request, "authorization");
  if (authorization?.startsWith(BEARER_PREFIX)) {
    const token = authorization.slice(BEARER_PREFIX.length);
    return token ? token : null;
  }

  return getHeaderValue(request, "x-api-key") ?? getHeaderValue(request, "api-key");
};

export const authenticateRequest = (
  input: { path: string; request: Pick<FastifyRequest, "headers"> },
  options: ApiKeyAuthOptions
): AuthenticationOutcome => {
  if (options.exemptPaths.has(input.path)) {
    return { kind: "exempt" };
  }

  if (!options.required) {
    return { kind: "not-required" };
  }

  const apiKey = extractApiKey(input.request);
  if (!apiKey) {
    return { kind: "missing" };
  }

  const verified = options.credentials.verify(apiKey);
  if (!verified) {
    return { kind: "invalid" };
  }

  return {
    kind: "authenticated",
    context: {
      authenticated: true,
      identityDigest: verified.identityDigest,
    },
  };
};

export const getAuthContext = (request: FastifyRequest): AuthContext | null => authContext.get(request) ?? null;

/**
 * Classifies the credential and records the attempt. A rejection is held on
 * the request instead of thrown so the rate limiter still charges the caller's
 * address for it; `enforceApiKeyAuth` raises it afterwards.
 */
export const createApiKeyAuthMiddleware = (
  options: ApiKeyAuthOptions & { collector: MetricsCollector }
): onRequestHookHandler => {
  return async (request) => {
    const path = getRequestPath(request);
    const outcome = authenticateRequest({ path, request }, options);

    switch (outcome.kind) {
      case "exempt":
      case "not-required":
        return;
      case "missing":
        options.collector.recordAuthAttempt(false);
        request.log.warn({ path }, "No API key provided");
        authRejections.set(
          request,
          new HttpError(
            401,
            "AUTHENTICATION_REQUIRED",
            "Please provide an API key using the Authorization header (Bearer token), X-API-Key or API-Key header",
            undefined,
            { "WWW-Authenticate": WWW_AUTHENTICATE_CHALLENGE }
          )
        );
        return;
      case "invalid":
        options.collector.recordAuthAttempt(false);
        request.log.warn({ path }, "Invalid API key attempt");
        authRejections.set(request, new HttpError(403, "INVALID_API_KEY", "The provided API key is not valid"));
        return;
      case "authenticated":
        options.collector.recordAuthAttempt(true);
        authContext.set(request, outcome.context);
        request.log.debug({ path, identityDigest: outcome.context.identityDigest }, "API key accepted");
        return;
    }
  };
};

export const enforceApiKeyAuth: onRequestHookHandler = async (request) => {
  const rejection = authRejections.get(request);
  if (rejection) {
    throw rejection;
  }
};
