// src/controllers/accountController.ts

import { Request, Response } from "express";
import { Model } from "mongoose";
import Admin from "../models/Admin";
import { IAccount } from "../models/Account";
import Surveyor from "../models/Surveyor";
import { createAccount, updateAccount } from "../services/accountService";
import { sendServerError } from "./httpErrors";

// Admins and surveyors expose the same endpoints over their own collections
const createAccountHandlers = (model: Model<IAccount>, label: string) => ({
  handleCreate: async (req: Request, res: Response): Promise<void> => {
    try {
      const result = await createAccount(model, req.body);
      if (!result.success) {
        const { statusCode, ...body } = result;
        res.status(statusCode).json(body);
        return;
      }
      res.status(201).json({
        success: true,
        message: `${label} created successfully.`,
        data: result.data,
      });
    } catch (error) {
      console.error(`Error creating ${label.toLowerCase()}:`, error);
      sendServerError(res, error);
    }
  },

  handleList: async (req: Request, res: Response): Promise<void> => {
    try {
      const accounts = await model.find({}).lean();
      res.status(200).json({ success: true, data: accounts });
    } catch (error) {
      sendServerError(res, error);
    }
  },

  handleGet: async (req: Request, res: Response): Promise<void> => {
    try {
      const account = await model.findOne({ _id: req.params.id }).lean();
      if (!account) {
        res.status(404).json({ success: false, message: `${label} not found` });
        return;
      }
      res.status(200).json({ success: true, data: account });
    } catch (error) {
      sendServerError(res, error);
    }
  },

  handleUpdate: async (req: Request, res: Response): Promise<void> => {
    try {
      const result = await updateAccount(model, label, req.params.id, req.body);
      if (!result.success) {
        const { statusCode, ...body } = result;
        res.status(statusCode).json(body);
        return;
      }
      res.status(200).json({
        success: true,
        message: `${label} updated successfully`,
        data: result.data,
      });
    } catch (error) {
      sendServerError(res, error);
    }
  },

  handleDelete: async (req: Request, res: Response): Promise<void> => {
    try {
      const result = await model.deleteOne({ _id: req.params.id });
      if (result.deletedCount === 0) {
        res.status(404).json({ success: false, message: `${label} not found` });
        return;
      }
      res.status(200).json({ success: true, message: `${label} deleted successfully` });
    } catch (error) {
      sendServerError(res, error);
    }
  },
});

export type AccountHandlers = ReturnType<typeof createAccountHandlers>;

export const adminHandlers = createAccountHandlers(Admin, "Admin");
export const surveyorHandlers = createAccountHandlers(Surveyor, "Surveyor");
