import type { FastifyReply, FastifyRequest } from "fastify";
import jwt from "jsonwebtoken";
import { z } from "zod";

declare module "fastify" {
  interface FastifyRequest {
    userId: string | null;
  }
}

const tokenPayloadSchema = z.object({
  user_id: z.union([z.string().min(1), z.number()]).transform(String),
});

/** Bearer-token guard; sets `request.userId` from the token's `user_id` claim. */
export function createAuthGuard(jwtSecret: string) {
  return async function requireAuth(req: FastifyRequest, reply: FastifyReply) {
    const auth = req.headers["authorization"];
    if (!auth || !auth.startsWith("Bearer ")) {
      return reply
        .status(401)
        .send({ error: "Missing or invalid Authorization header" });
    }
    const token = auth.slice("Bearer ".length);
    let payload: unknown;
    try {
      payload = jwt.verify(token, jwtSecret);
    } catch (err) {
      req.log.debug({ err }, "[AUTH] Token verification failed");
      return reply.status(401).send({ error: "Invalid or expired token" });
    }
    const claims = tokenPayloadSchema.safeParse(payload);
    if (!claims.success) {
      return reply.status(401).send({ error: "Token is missing user_id" });
    }
    req.userId = claims.data.user_id;
  };
}
