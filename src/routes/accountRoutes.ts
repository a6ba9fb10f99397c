// src/routes/accountRoutes.ts

import { Router } from "express";
import {
  AccountHandlers,
  adminHandlers,
  surveyorHandlers,
} from "../controllers/accountController";

/**
 * @route   /api/admins, /api/surveyors
 * @desc    CRUD over admin and surveyor accounts; passwords are hashed on
 *          write and never returned
 */
const createAccountRouter = (handlers: AccountHandlers): Router => {
  const router = Router();
  router.post("/", handlers.handleCreate);
  router.get("/", handlers.handleList);
  router.get("/:id", handlers.handleGet);
  router.put("/:id", handlers.handleUpdate);
  router.delete("/:id", handlers.handleDelete);
  return router;
};

export const adminRoutes = createAccountRouter(adminHandlers);
export const surveyorRoutes = createAccountRouter(surveyorHandlers);
