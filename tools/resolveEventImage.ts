// DEV TOOL: resolves one event title (and optional location) to a cached image id.
import "dotenv/config";
import { createImagery } from "../imagery/createImagery.js";
import { loadConfig } from "../lib/config.js";

function usage() {
  console.error('Usage: tsx tools/resolveEventImage.ts "<event title>" ["<location>"]');
}

async function main() {
  const title = process.argv[2];
  if (!title) {
    usage();
    process.exit(1);
  }
  const location = process.argv[3] || undefined;

  const { store, resolver, stopSweep } = await createImagery(loadConfig(), { sweepOnOpen: false });
  const result = await resolver.resolve({ title, location });
  stopSweep();

  console.log(
    JSON.stringify(
      {
        imageId: result.imageId,
        record: result.imageId ? store.get(result.imageId) : null,
        queue: resolver.queueStatus(),
      },
      null,
      2
    )
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
