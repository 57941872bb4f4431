import type { FastifyReply } from 'fastify';

export interface ErrorBody {
  error: string;
}

export function sendError(reply: FastifyReply, status: number, message: string): FastifyReply {
  const payload: ErrorBody = { error: message };
  return reply.status(status).send(payload);
}

export function sendUnauthorized(reply: FastifyReply, message: string, challenge = 'Bearer'): FastifyReply {
  reply.header('www-authenticate', challenge);
  return sendError(reply, 401, message);
}
