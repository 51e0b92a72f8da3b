/**
 * Hono Application
 *
 * Route table and cross-cutting middleware. Collaborators arrive through
 * `deps` so the same app runs under the server and in tests.
 */

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { isStoreUnavailable } from "@ttlink/shared";
import {
  handleAdmin,
  handleLiveness,
  handleMetadata,
  handleMetrics,
  handleReadiness,
  handleRedirect,
} from "./handler.js";
import * as metrics from "./metrics.js";
import type { AppDeps, AppEnv, ErrorResponse } from "./types.js";
import { handleUpload } from "./upload.js";

/** The admin view polls this; logging each call drowns everything else */
const QUIET_PREFIX = "/api/metadata/";

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.use("*", async (c, next) => {
    c.set("deps", deps);
    const start = performance.now();
    await next();

    if (!c.req.path.startsWith(QUIET_PREFIX)) {
      deps.logger.info(
        {
          method: c.req.method,
          path: c.req.path,
          status: c.res.status,
          ms: Number((performance.now() - start).toFixed(2)),
        },
        "request"
      );
    }
  });

  // ---------------------------------------------------------------------------
  // Health & Monitoring Routes (before the code catch-all)
  // ---------------------------------------------------------------------------

  app.get("/health", handleLiveness);
  app.get("/health/ready", handleReadiness);
  app.get("/metrics", handleMetrics);

  // ---------------------------------------------------------------------------
  // Creation, Inspection
  // ---------------------------------------------------------------------------

  app.post(
    "/upload",
    bodyLimit({
      maxSize: deps.maxUploadBytes,
      onError: (c) => {
        metrics.increment("upload_rejected");
        const body: ErrorResponse = { error: `Upload exceeds ${deps.maxUploadBytes} bytes` };
        return c.json(body, 413);
      },
    }),
    handleUpload
  );
  app.get("/api/metadata/:code", handleMetadata);
  app.get("/admin", handleAdmin);

  // ---------------------------------------------------------------------------
  // Lookup (catch-all for codes)
  // ---------------------------------------------------------------------------

  app.get("/:code", handleRedirect);

  app.notFound((c) => c.text("Not found", 404));

  app.onError((err, c) => {
    if (isStoreUnavailable(err)) {
      metrics.increment("store_unavailable");
      deps.logger.error({ err, path: c.req.path }, "Store unavailable");
      return c.text("Service Temporarily Unavailable", 503, { "Retry-After": "5" });
    }

    metrics.increment("internal_error");
    deps.logger.error({ err, path: c.req.path }, "Unhandled error");
    return c.text("Internal Server Error", 500);
  });

  return app;
}
