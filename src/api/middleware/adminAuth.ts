import basicAuth from 'express-basic-auth';
import type { RequestHandler } from 'express';

/**
 * HTTP basic auth for the admin user
 */
export function createAdminAuth(adminPassword: string): RequestHandler {
  return basicAuth({
    users: {
      admin: adminPassword,
    },
    challenge: true,
    unauthorizedResponse: { error: { message: 'Admin access required' } },
  });
}
