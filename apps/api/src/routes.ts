import { Router } from "express";
import { toProductPayload } from "@product-feedback/types";
import type { Catalog } from "./catalog";

export const STATUS_MESSAGE = "API is up and running";
export const PRODUCT_NOT_FOUND = "Product Not Found";

export const createRouter = (catalog: Catalog) => {
  const router = Router();

  router.get("/status", (_req, res) => {
    res.type("text/plain").send(STATUS_MESSAGE);
  });

  router.get("/products", (_req, res) => {
    res.json(catalog.list().map(toProductPayload));
  });

  // Feedback is accepted but not stored; the body is never read.
  router.post("/products/:slug/feedback", (req, res) => {
    const product = catalog.findBySlug(req.params.slug);

    res.type("application/json");
    if (product) {
      res.send(JSON.stringify(toProductPayload(product)));
    } else {
      // Plain text under a JSON content type, still 200: existing clients match on this body.
      res.send(PRODUCT_NOT_FOUND);
    }
  });

  return router;
};
