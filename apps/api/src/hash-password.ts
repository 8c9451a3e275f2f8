import { hashPassword } from "@relaymail/crypto";

/**
 * Prints the ADMIN_PASSWORD_HASH value for a password:
 *
 *   npm run hash-password -w @relaymail/api -- 'my admin password'
 */
async function main(): Promise<void> {
  const password = process.argv[2];
  if (!password) {
    console.error("Usage: npm run hash-password -w @relaymail/api -- <password>");
    process.exit(1);
  }
  console.log(await hashPassword(password));
}

main().catch((err: unknown) => {
  console.error("[hash-password] Failed:", err);
  process.exit(1);
});
