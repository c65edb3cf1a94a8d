/**
 * Trip Planning Routes
 * POST /api/plan runs the full pipeline; GET /api/plan/status reports which
 * external services are configured.
 */

import { Router, type Request, type Response } from "express";
import type { AppConfig } from "../config";
import { planRateLimiter, generalRateLimiter } from "../middleware/rateLimiter";
import { isAIConfigured } from "../services/aiClientFactory";
import { isGooglePlacesConfigured } from "../services/googlePlacesService";
import {
  httpStatusFor,
  planTrip,
  toFailureResponse,
  toTravelPlanResponse,
  type TripPlannerDeps,
} from "../services/tripPlanner";

export function createPlanRouter(config: AppConfig, deps: TripPlannerDeps): Router {
  const router = Router();

  /**
   * GET /api/plan/status
   */
  router.get("/status", generalRateLimiter, (_req: Request, res: Response) => {
    res.json({
      research: !!config.tavilyApiKey,
      discovery: isGooglePlacesConfigured(config.googlePlacesApiKey),
      synthesis: isAIConfigured(config.openaiApiKey),
      model: config.synthesisModel,
    });
  });

  /**
   * POST /api/plan
   * Body: { from, to, departureDate, returnDate, passengers, budget, travelClass?, tripType?, places? }
   */
  router.post("/", planRateLimiter, async (req: Request, res: Response) => {
    try {
      const plan = await planTrip(req.body, deps);
      res.json(toTravelPlanResponse(plan));
    } catch (error) {
      const status = httpStatusFor(error);
      if (status === 500) {
        console.error("[PlanRoute] Unexpected planning error:", error);
      }
      res.status(status).json(toFailureResponse(error));
    }
  });

  return router;
}
