// src/app.ts

import express, { Express, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import questionSetRoutes from "./routes/questionSetRoutes";
import responseRoutes from "./routes/responseRoutes";
import migrationRoutes from "./routes/migrationRoutes";
import surveyRoutes from "./routes/surveyRoutes";
import participantRoutes from "./routes/participantRoutes";
import cycleRoutes from "./routes/cycleRoutes";
import analysisRoutes from "./routes/analysisRoutes";
import { adminRoutes, surveyorRoutes } from "./routes/accountRoutes";
import { errorHandler, notFound } from "./middleware/errorHandler";

const app: Express = express();

app.use(express.json({ limit: "10mb" }));
app.use(express.urlencoded({ extended: true, limit: "10mb" }));

app.use(
  cors({
    origin: "*",
    methods: ["GET", "POST", "PUT", "DELETE", "PATCH"],
    allowedHeaders: ["Content-Type", "Authorization"],
  })
);

app.use(helmet());
app.use(morgan("dev"));

// Routes
app.use("/api/questions", questionSetRoutes);
app.use("/api/responses", responseRoutes);
app.use("/api/migrations", migrationRoutes);
app.use("/api/surveys", surveyRoutes);
app.use("/api/participants", participantRoutes);
app.use("/api/cycles", cycleRoutes);
app.use("/api/analysis", analysisRoutes);
app.use("/api/admins", adminRoutes);
app.use("/api/surveyors", surveyorRoutes);

// Basic route
app.get("/", (req: Request, res: Response) => {
  res.json({ message: "Survey API running" });
});

app.use(notFound);
app.use(errorHandler);

export default app;
