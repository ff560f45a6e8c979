// backend/services/blog/src/routes/postRoutes.ts
import { Router } from "express";

// Direct handler imports (no barrels, no adapters)
import { list } from "../controllers/post/handlers/list";
import { findById } from "../controllers/post/handlers/findById";
import { create } from "../controllers/post/handlers/create";
import { update } from "../controllers/post/handlers/update";
import { remove } from "../controllers/post/handlers/remove";

const router = Router();

// one-liners only; no logic here
router.get("/", list);
router.get("/:id", findById);
router.post("/", create);
router.put("/:id", update);
router.delete("/:id", remove);

export default router;
