// Usage: npm run sync -- [since]
import { runCli } from "@/lib/sync/cli";

runCli(process.argv.slice(2))
	.then((code) => process.exit(code))
	.catch((err: unknown) => {
		process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
		process.exit(1);
	});
