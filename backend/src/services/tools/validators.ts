import { isIP } from "node:net";

import { z } from "zod";

const SHELL_METACHARACTERS = /[;&|`$(){}<>\n\r\\'"\s]/;
const HOSTNAME_PATTERN = /^(?!-)[a-zA-Z0-9-]{1,63}(?<!-)(\.(?!-)[a-zA-Z0-9-]{1,63}(?<!-))*\.?$/;
const DOMAIN_PATTERN = /^(?!-)[a-z0-9_-]{1,63}(?<!-)(\.(?!-)[a-z0-9_-]{1,63}(?<!-))*\.?$/;
const HEADER_NAME_PATTERN = /^[A-Za-z0-9!#%&'*+.^_`|~-]+$/;

export const DNS_RECORD_TYPES = ["A", "AAAA", "CNAME", "MX", "NS", "PTR", "SOA", "SRV", "TXT", "ANY"] as const;
export const HTTP_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS"] as const;
export const SOCKET_STATES = [
  "established",
  "syn-sent",
  "syn-recv",
  "fin-wait-1",
  "fin-wait-2",
  "time-wait",
  "closed",
  "close-wait",
  "last-ack",
  "listening",
  "closing",
] as const;

export const isValidHost = (value: string): boolean => isIP(value) !== 0 || HOSTNAME_PATTERN.test(value);

export const hostSchema = z
  .string()
  .trim()
  .min(1, "must not be empty")
  .max(253, "must be at most 253 characters")
  .refine((value) => !SHELL_METACHARACTERS.test(value), "contains invalid characters")
  .refine(isValidHost, "must be a hostname or IP address");

const isValidNetworkTarget = (value: string): boolean => {
  const [address, prefix, ...rest] = value.split("/");
  if (rest.length > 0 || !address) {
    return false;
  }

  if (prefix === undefined) {
    return isValidHost(address);
  }

  const family = isIP(address);
  if (family === 0 || !/^\d{1,3}$/.test(prefix)) {
    return false;
  }

  return Number(prefix) <= (family === 4 ? 32 : 128);
};

/** A host, or an IP network in CIDR notation. */
export const networkTargetSchema = z
  .string()
  .trim()
  .min(1, "must not be empty")
  .max(253, "must be at most 253 characters")
  .refine((value) => !SHELL_METACHARACTERS.test(value), "contains invalid characters")
  .refine(isValidNetworkTarget, "must be a hostname, IP address or CIDR network");

export const domainSchema = z
  .string()
  .trim()
  .toLowerCase()
  .min(1, "must not be empty")
  .max(253, "must be at most 253 characters")
  .refine((value) => !SHELL_METACHARACTERS.test(value), "contains invalid characters")
  .refine((value) => DOMAIN_PATTERN.test(value) || isIP(value) !== 0, "must be a domain name");

export const portSchema = z.number().int().min(1).max(65535);

export const portSpecSchema = z
  .string()
  .trim()
  .regex(/^[0-9,-]+$/, "may only contain digits, commas and dashes")
  .superRefine((value, ctx) => {
    for (const part of value.split(",")) {
      const bounds = part.split("-");
      const ports = bounds.map((bound) => (/^\d+$/.test(bound) ? Number(bound) : Number.NaN));
      const valid = bounds.length <= 2 && ports.every((port) => port >= 1 && port <= 65535);

      if (!valid) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid port or range "${part}"` });
        return;
      }

      const [start, end] = ports;
      if (start !== undefined && end !== undefined && start > end) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `range "${part}" starts after it ends` });
        return;
      }
    }
  });

const isHttpUrl = (value: string): boolean => {
  try {
    const parsed = new URL(value);
    return (parsed.protocol === "http:" || parsed.protocol === "https:") && parsed.hostname.length > 0;
  } catch {
    return false;
  }
};

export const urlSchema = z
  .string()
  .trim()
  .url("must be a valid URL")
  .refine((value) => !/[\s`$;|<>]/.test(value), "contains invalid characters")
  .refine(isHttpUrl, "must be an http or https URL with a host");

export const recordTypeSchema = z.string().trim().toUpperCase().pipe(z.enum(DNS_RECORD_TYPES));

export const httpMethodSchema = z.string().trim().toUpperCase().pipe(z.enum(HTTP_METHODS));

export const httpHeadersSchema = z.record(
  z.string().regex(HEADER_NAME_PATTERN, "invalid header name"),
  z.string().refine((value) => !/[\r\n]/.test(value), "header values may not contain line breaks")
);

export const boundedInt = (min: number, max: number) => z.number().int().min(min).max(max);

export const protocolSchema = z.enum(["tcp", "udp"]);

export const socketStateSchema = z.enum(SOCKET_STATES);

export const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
