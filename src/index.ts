import { runCli } from "./cli";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv, { env: process.env });
}

main().catch((err) => {
  console.error("fatal error:", err);
  process.exit(1);
});
