import express from "express";
import cors from "cors";
import type { Server } from "http";
import { addSecurityHeaders } from "./middleware/security";
import { registerRoutes, type RouteDependencies } from "./routes";

export function createApp(deps: RouteDependencies): Server {
  const app = express();
  app.set("trust proxy", 1);
  app.use(cors());
  app.use(addSecurityHeaders);
  app.use(express.json({ limit: "100kb" }));

  return registerRoutes(app, deps);
}
