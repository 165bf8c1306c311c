/**
 * Rules Upload Utility
 * Publishes a local rules PDF to the storage bucket the service reads its rules from.
 * The running service caches rules for its lifetime: restart it to pick up a new upload.
 */
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createClient } from "@supabase/supabase-js";
import dotenv from "dotenv";

const scriptDir = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(scriptDir, "../.env") });

const SUPABASE_URL = process.env.SUPABASE_URL;
const SB_SECRET_KEY = process.env.SB_SECRET_KEY;
const RULES_BUCKET = process.env.RULES_BUCKET || "rule-documents";
const RULES_OBJECT_KEY = process.env.RULES_OBJECT_KEY || "rules.pdf";

if (!SUPABASE_URL || !SB_SECRET_KEY) {
  console.error("Error: SUPABASE_URL and SB_SECRET_KEY must be set in .env");
  process.exit(1);
}

const serviceClient = createClient(SUPABASE_URL, SB_SECRET_KEY);

async function main(): Promise<void> {
  const filePath = process.argv[2];
  if (!filePath) {
    console.log("Usage: npm run upload-rules -- <rules.pdf>");
    process.exit(1);
  }

  if (!fs.existsSync(filePath)) {
    console.error(`File not found: ${filePath}`);
    process.exit(1);
  }

  console.log(`Target: ${SUPABASE_URL}`);
  console.log(`Destination: ${RULES_BUCKET}/${RULES_OBJECT_KEY}`);
  console.log(`File: ${filePath}`);

  const fileContent = fs.readFileSync(filePath);

  const { error } = await serviceClient.storage
    .from(RULES_BUCKET)
    .upload(RULES_OBJECT_KEY, fileContent, {
      contentType: "application/pdf",
      upsert: true,
    });

  if (error) {
    console.error("Upload failed:", error.message);
    process.exit(1);
  }

  console.log(`Uploaded ${fileContent.length} bytes.`);
}

main().catch((err) => {
  console.error("Upload request failed:", err);
  process.exit(1);
});
