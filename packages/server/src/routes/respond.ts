import type { LoginResponse } from '@authgate/shared';
import type { Context } from 'hono';
import type { AuthFailure } from '../errors/auth-failure.js';
import type { SessionTransport, DeliveryPlan } from '../transport/session-transport.js';

/**
 * Render an expected failure
 */
export function sendFailure(c: Context, failure: AuthFailure): Response {
  return c.json(failure.toJSON(), failure.statusCode);
}

/**
 * Apply the cookies of a plan and send its body
 */
export function deliver(c: Context, transport: SessionTransport, plan: DeliveryPlan<LoginResponse>): Response {
  transport.apply(c, plan.cookies);
  return c.json(plan.body);
}

/**
 * Apply the cookies of a body-less plan (sign-out, password change)
 */
export function deliverEmpty(c: Context, transport: SessionTransport, plan: DeliveryPlan<null>): Response {
  transport.apply(c, plan.cookies);
  return c.body(null, 204);
}
