// backend/services/blog/src/routes/commentRoutes.ts
import { Router } from "express";

import { list } from "../controllers/comment/handlers/list";
import { findById } from "../controllers/comment/handlers/findById";
import { create } from "../controllers/comment/handlers/create";
import { update } from "../controllers/comment/handlers/update";
import { remove } from "../controllers/comment/handlers/remove";

const router = Router();

router.get("/", list);
router.get("/:id", findById);
router.post("/", create);
router.put("/:id", update);
router.delete("/:id", remove);

export default router;
