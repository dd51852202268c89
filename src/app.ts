import express from "express";
import { Server } from "http";
import { createLookupController, LookupBackend } from "./controllers/lookup-controller";
import { createLookupRoutes } from "./routes/lookup-routes";

export interface AppOptions {
  /** Access-Control-Allow-Origin value attached to every response */
  allowOrigin?: string;
}

export function createApp(backend: LookupBackend, options: AppOptions = {}) {
  const app = express();
  const { allowOrigin } = options;

  app.disable("x-powered-by");

  if (allowOrigin) {
    app.use((req, res, next) => {
      res.set("Access-Control-Allow-Origin", allowOrigin);
      next();
    });
  }

  // Routes
  app.use("/lookup", createLookupRoutes(backend));

  // Health check endpoint
  app.get("/health", createLookupController(backend).health);

  // Error handling middleware
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction
    ) => {
      console.error(err.stack);
      res.status(500).json({ error: "Internal Server Error" });
    }
  );

  return app;
}

/**
 * Start listening, resolving once the port is bound and rejecting when it
 * cannot be (EADDRINUSE, EACCES)
 */
export function listen(app: express.Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once("listening", () => {
      server.off("error", reject);
      resolve(server);
    });
    server.once("error", reject);
  });
}

export default createApp;
