import type { FastifyRequest } from 'fastify';

export const resolveRoutePath = (request: FastifyRequest, fallback: string): string => {
  const url = request.routeOptions.url;
  return url ? `${request.method} ${url}` : fallback;
};
