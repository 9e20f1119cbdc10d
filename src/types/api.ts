// Wire types shared by the HTTP routes and the client adapter
import { z } from 'zod';

// The only failure text a client shows for sign-in, whatever went wrong
export const SIGN_IN_FAILED_MESSAGE = 'Sign-in failed. Please try again.';

export interface AppleAuthRequest {
  platformUserId: string;
  email?: string | null;
  receiptData?: string;
}

export const userSummarySchema = z.object({
  id: z.string().min(1),
  email: z.string(),
});
export type UserSummary = z.infer<typeof userSummarySchema>;

export const authResponseSchema = z.object({
  success: z.literal(true),
  token: z.string().min(1),
  user: userSummarySchema,
});
export type AuthResponse = z.infer<typeof authResponseSchema>;

export const subscriptionStatusResponseSchema = z.object({
  isActive: z.boolean(),
  subscription: z.object({
    productId: z.string(),
    expiresAt: z.string().datetime(),
  }).optional(),
});
export type SubscriptionStatusResponse = z.infer<typeof subscriptionStatusResponseSchema>;

export const errorResponseSchema = z.object({
  success: z.literal(false),
  error: z.string(),
  message: z.string(),
});
export type ErrorResponse = z.infer<typeof errorResponseSchema>;

export const healthResponseSchema = z.object({
  status: z.literal('healthy'),
  timestamp: z.string().datetime(),
});
export type HealthResponse = z.infer<typeof healthResponseSchema>;
