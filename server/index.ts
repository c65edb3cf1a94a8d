import "dotenv/config";
import express, { type Request, type Response, type NextFunction } from "express";
import compression from "compression";
import { createServer } from "http";
import { getConfig } from "./config";
import { registerRoutes } from "./routes";
import { createTripPlannerDeps } from "./services/tripPlanner";

const config = getConfig();
const app = express();
const httpServer = createServer(app);

// Every /api reply over 1KB; plan replies carry the itinerary and location bundle.
app.use(
  compression({
    threshold: 1024,
    filter: (req, res) => req.path.startsWith("/api") || compression.filter(req, res),
  }),
);

app.use(express.json({ limit: "100kb" }));
app.use(express.urlencoded({ extended: false }));

function log(message: string, source = "http") {
  const clock = new Date().toISOString().slice(11, 19);
  console.log(`${clock} [${source}] ${message}`);
}

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
});

registerRoutes(app, config, createTripPlannerDeps(config));

app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  const status = readStatus(err);
  const message = err instanceof Error && status < 500 ? err.message : "Internal Server Error";

  if (status >= 500) {
    console.error("[express] Unhandled error:", err);
  }
  res.status(status).json({ success: false, error: message, error_code: status < 500 ? "bad_request" : "internal_error" });
});

function readStatus(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const candidate = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof candidate === "number" && candidate >= 400 && candidate < 600) return candidate;
  }
  return 500;
}

httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
  log(`serving on port ${config.port}`);
  if (!config.openaiApiKey) {
    console.warn("[Startup] OPENAI_API_KEY is not set; every plan request will fail at synthesis");
  }
  if (!config.tavilyApiKey) console.warn("[Startup] TAVILY_API_KEY is not set; research will be skipped");
  if (!config.googlePlacesApiKey) console.warn("[Startup] GOOGLE_PLACES_API_KEY is not set; location discovery will be skipped");
});
