import { AppError, ExternalServiceError, ValidationError } from "@/middleware/error";
import type { AppServices } from "@/services";
import { isWellFormedReceipt, type ReceiptOutcome } from "@/services/receipt-validator";
import { SIGN_IN_FAILED_MESSAGE, type AuthResponse } from "@/types/api";
import { ErrorCode, type Middleware } from "@/types/common";
import { asyncHandler } from "@/utils/async-handler";
import { formatError } from "@/utils/error-formatter";
import { log } from "@/utils/logger";
import type { Request, Response } from "express";
import { Router } from "express";
import { z } from "zod";

const deliverableEmail = z.string().email().max(320);

// No expiration field: expiry only ever comes from the verified receipt.
// Email is best-effort: an address that does not parse is stored as "".
export const appleAuthSchema = z.object({
	platformUserId: z.string().trim().min(1, "platformUserId is required").max(512),
	email: z
		.string()
		.nullish()
		.transform((raw) => {
			const email = (raw ?? "").trim().toLowerCase();
			return deliverableEmail.safeParse(email).success ? email : "";
		}),
	receiptData: z
		.string()
		.nullish()
		.transform((receipt) => receipt ?? "")
		.refine((receipt) => receipt.trim() === "" || isWellFormedReceipt(receipt), {
			message: "receiptData must be base64 encoded",
		}),
});

const describeIssues = (error: z.ZodError): string =>
	error.issues
		.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
		.join("; ");

type AuthServices = Pick<AppServices, "users" | "receipts" | "ledger" | "sessions">;

const signInFailed = (): AppError =>
	new AppError(SIGN_IN_FAILED_MESSAGE, ErrorCode.SERVER_ERROR, 500);

export const createAuthRouter = (
	{ users, receipts, ledger, sessions }: AuthServices,
	authRateLimiter: Middleware,
): Router => {
	const router = Router();

	/**
	 * Verifies the receipt and records the purchase it proves.
	 * When the verification service is unavailable the sign-in goes ahead without a
	 * subscription; the next sign-in with a receipt records it.
	 */
	const recordReceipt = async (userId: string, receiptData: string): Promise<void> => {
		let outcome: ReceiptOutcome;
		try {
			outcome = await receipts.verifyReceipt(receiptData);
		} catch (error) {
			if (error instanceof ExternalServiceError) {
				log.warn("Receipt verification unavailable, signing in without a subscription", {
					userId,
					reviewFlag: "fail-open-login",
					error: formatError(error),
				});
				return;
			}
			throw error;
		}

		if (outcome.kind === "none") {
			log.debug("No subscription to record", { userId, reason: outcome.reason });
			return;
		}

		const { transactionId, productId, expiresAt } = outcome.purchase;
		const saved = await ledger.upsert(userId, transactionId, productId, expiresAt);
		if (!saved.success) {
			log.error("Failed to record subscription during sign-in", {
				userId,
				transactionId,
				error: formatError(saved.error),
			});
			throw signInFailed();
		}
	};

	/**
	 * Sign in with the platform identity and, optionally, the App Store receipt
	 * POST /auth/apple
	 */
	const signInWithApple = async (req: Request, res: Response): Promise<void> => {
		const validation = appleAuthSchema.safeParse(req.body ?? {});
		if (!validation.success) {
			throw new ValidationError(`Invalid request format: ${describeIssues(validation.error)}`);
		}

		const { platformUserId, email, receiptData } = validation.data;

		const userResult = await users.resolveUser(platformUserId, email);
		if (!userResult.success) {
			log.error("Failed to resolve user during sign-in", { error: formatError(userResult.error) });
			throw signInFailed();
		}
		const user = userResult.data;

		await recordReceipt(user.id, receiptData);

		const tokenResult = await sessions.createSessionToken(user.id);
		if (!tokenResult.success) {
			log.error("Failed to create session token", { userId: user.id, error: formatError(tokenResult.error) });
			throw signInFailed();
		}

		log.info("User signed in", { userId: user.id });
		const body: AuthResponse = {
			success: true,
			token: tokenResult.data,
			user: { id: user.id, email: user.email },
		};
		res.status(200).json(body);
	};

	router.post("/apple", authRateLimiter, asyncHandler(signInWithApple));

	return router;
};
