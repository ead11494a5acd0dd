import express, { type Express } from "express";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

const serverDir = path.dirname(fileURLToPath(import.meta.url));
export const publicDir = path.resolve(serverDir, "public");

export function serveLandingPage(app: Express) {
  if (!fs.existsSync(path.join(publicDir, "index.html"))) {
    throw new Error(`Could not find the landing page in: ${publicDir}`);
  }

  // Only real files are served; unknown paths fall through to the JSON 404
  app.use(express.static(publicDir, {
    index: "index.html",
    maxAge: "1d",
    setHeaders: (res, filePath) => {
      if (filePath.endsWith(".html")) {
        res.setHeader("Cache-Control", "no-cache");
      }
    },
  }));
}
