/**
 * Status API application: middleware, error boundary and routes.
 */
import { Hono } from "hono";

import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { routes } from "./routes.js";

export function createApp(): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);
  app.route("/", routes);

  return app;
}
