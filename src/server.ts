// src/server.ts

import app from "./app";
import connectDB, { disconnectDB } from "./config/database";
import { getConfig } from "./config/env";

const start = async (): Promise<void> => {
  const { PORT } = getConfig();
  await connectDB();

  const server = app.listen(PORT, () => {
    console.log(`Server is running on port ${PORT}`);
  });

  server.on("error", (error: NodeJS.ErrnoException) => {
    if (error.code === "ECONNRESET") {
      console.log("Connection reset by client");
    } else {
      console.error("Server error:", error);
    }
  });

  process.on("SIGTERM", () => {
    console.log("SIGTERM received - shutting down server gracefully");
    server.close(() => {
      disconnectDB()
        .then(() => {
          console.log("Server closed");
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error("Error closing MongoDB connection:", error);
          process.exit(1);
        });
    });
  });
};

start().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
