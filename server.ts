import express from "express";
import cors from "cors";
import { postsRouter } from "./api/posts";
import { env } from "./config/env";

const app = express();

app.use(cors());
app.use(express.json());

app.get("/health", (_req, res) => {
  res.json({ ok: true });
});

app.use("/posts", postsRouter);

app.listen(env.PORT, () => {
  console.log(`Post generator running on port ${env.PORT}`);
});
