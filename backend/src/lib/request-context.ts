import type { FastifyRequest } from "fastify";

export const getRequestPath = (request: FastifyRequest): string =>
  (request.raw.url ?? request.url).split("?")[0] ?? request.url;

export const getHeaderValue = (request: Pick<FastifyRequest, "headers">, name: string): string | null => {
  const value = request.headers[name.toLowerCase()];
  if (!value) {
    return null;
  }

  if (Array.isArray(value)) {
    return value[0] ?? null;
  }

  return value;
};

export const getPeerAddress = (request: FastifyRequest): string => {
  return request.ip ? request.ip : "unknown";
};
