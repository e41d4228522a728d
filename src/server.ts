import "dotenv/config";
import { createServer } from "node:http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { WordSegmentation } from "./modules/segmenter/segmentation";
import { UndertheseaSegmenter } from "./modules/segmenter/underthesea";
import { errorMessage, log } from "./util/log";

const main = async () => {
  const config = loadConfig();

  const segmenter = config.segmenter.enabled
    ? new UndertheseaSegmenter({
        pythonBin: config.segmenter.pythonBin,
        timeoutMs: config.segmenter.timeoutMs,
      })
    : null;
  if (!segmenter) {
    log.info("word segmentation disabled by SEGMENTER_ENABLED");
  }

  // Decided once; the process keeps this answer until it restarts.
  const segmentation = await WordSegmentation.init(segmenter);

  const server = createServer(createApp({ config, segmentation }));
  server.listen(config.port, () => {
    log.info("normalizer listening", {
      port: config.port,
      segmenterAvailable: segmentation.available,
    });
  });

  const shutdown = (signal: string) => {
    log.info("shutting down", { signal });
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
};

main().catch((e) => {
  log.error("startup failed", { error: errorMessage(e) });
  process.exit(1);
});
