/**
 * Claim Submission Utility
 * Sends local PDFs to a running service's /submit-claim endpoint and prints the report.
 */
import fs from "node:fs";
import path from "node:path";

const SERVICE_URL = process.env.SERVICE_URL || "http://localhost:8080";

async function main(): Promise<void> {
  const filePaths = process.argv.slice(2);
  if (filePaths.length === 0) {
    console.log(
      "Usage: npm run submit-claim -- <file.pdf> [more.pdf ...]",
    );
    process.exit(1);
  }

  const formData = new FormData();
  for (const filePath of filePaths) {
    if (!fs.existsSync(filePath)) {
      console.error(`File not found: ${filePath}`);
      process.exit(1);
    }
    const blob = new Blob([fs.readFileSync(filePath)], {
      type: "application/pdf",
    });
    formData.append("files", blob, path.basename(filePath));
  }

  console.log(`Target: ${SERVICE_URL}/submit-claim`);
  console.log(`Files: ${filePaths.join(", ")}`);

  const response = await fetch(`${SERVICE_URL}/submit-claim`, {
    method: "POST",
    body: formData,
  });

  const body: unknown = await response.json();
  if (!response.ok) {
    console.error(`Submission failed (${response.status}):`);
    console.error(JSON.stringify(body, null, 2));
    process.exit(1);
  }

  console.log(JSON.stringify(body, null, 2));
}

main().catch((err) => {
  console.error("Submission request failed:", err);
  process.exit(1);
});
