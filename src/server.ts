import express from "express";
import next from "next";
import { handleAnalyzeRequest } from "./requests";

async function main(): Promise<void> {
  const dev = process.env.NODE_ENV !== "production";
  const app = next({ dev });
  const handle = app.getRequestHandler();

  await app.prepare();

  const server = express();
  server.use(express.json({ limit: process.env.EXPOSURE_BODY_LIMIT || "5mb" }));

  // POST /analyze -> report lines + per-band lists
  server.post("/analyze", (req, res) => {
    try {
      const { status, body } = handleAnalyzeRequest(req.body);
      return res.status(status).json(body);
    } catch (err) {
      console.error("Failed to analyze:", err);
      return res.status(500).json({ error: "Failed to analyze inputs" });
    }
  });

  // Let Next handle everything else
  server.all("*", (req, res) => {
    handle(req, res).catch((err: unknown) => {
      console.error("Page handler failed:", err);
      res.status(500).end();
    });
  });

  const port = Number.parseInt(process.env.PORT || "3000", 10);
  server.listen(port, () => {
    console.log(`Server ready on http://localhost:${port} (dev=${dev})`);
  });
}

main().catch((err) => {
  console.error("Fatal server error:", err);
  process.exit(1);
});
