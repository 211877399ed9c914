import "dotenv/config";
import { createAccessToken } from "../src/middleware/auth";

// Usage: npm run issue-token -- <subject> [ttlSeconds]
async function main() {
  const [subject, ttl = "3600"] = process.argv.slice(2);
  const secret = process.env.JWT_SECRET_KEY;

  if (!subject || !secret) {
    console.error("Usage: JWT_SECRET_KEY=... npm run issue-token -- <subject> [ttlSeconds]");
    process.exit(1);
  }

  const ttlSeconds = Number(ttl);
  if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
    console.error(`Invalid ttl "${ttl}"`);
    process.exit(1);
  }

  console.log(await createAccessToken(secret, subject, ttlSeconds));
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
