import type { Express } from "express";
import type { AppConfig } from "./config";
import type { TripPlannerDeps } from "./services/tripPlanner";
import { createPlanRouter } from "./routes/plan";

export function registerRoutes(app: Express, config: AppConfig, deps: TripPlannerDeps): Express {
  app.use("/api/plan", createPlanRouter(config, deps));

  app.use("/api", (_req, res) => {
    res.status(404).json({ success: false, error: "Not found", error_code: "not_found" });
  });

  return app;
}
