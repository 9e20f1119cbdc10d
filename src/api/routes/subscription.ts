import { getUserId } from "@/middleware/auth";
import type { EntitlementService } from "@/services/entitlement-service";
import type { SubscriptionStatusResponse } from "@/types/api";
import type { Middleware } from "@/types/common";
import { asyncHandler } from "@/utils/async-handler";
import { log } from "@/utils/logger";
import type { Request, Response } from "express";
import { Router } from "express";

export const createSubscriptionRouter = (
	entitlements: EntitlementService,
	requireAuth: Middleware,
): Router => {
	const router = Router();

	router.use(requireAuth);

	router.get(
		"/status",
		asyncHandler(async (req: Request, res: Response) => {
			const userId = getUserId(req);
			const status = await entitlements.getStatus(userId);
			log.debug("Retrieved subscription status", { userId, active: status.isActive });

			const body: SubscriptionStatusResponse = status.subscription
				? {
						isActive: status.isActive,
						subscription: {
							productId: status.subscription.productId,
							expiresAt: status.subscription.expiresAt.toISOString(),
						},
					}
				: { isActive: status.isActive };

			res.status(200).json(body);
		}),
	);

	return router;
};
