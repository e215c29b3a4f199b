import "dotenv/config";
import { logger } from "./config/logger";
import { ConfigError, loadConfig } from "./config/env";
import type { EnvConfig } from "./config/env";
import { ConversationDispatcher } from "./bot/dispatcher";
import { CollectionStateMachine } from "./flow/stateMachine";
import { createApp } from "./server";
import { createGraphClient } from "./services/graphClient";
import { WhatsAppMediaSource } from "./services/waMedia";
import { WhatsAppClient } from "./services/whatsappClient";
import { SessionStore } from "./state/session";
import { createSessionAdapter } from "./state/store";
import { GoogleDriveAssetStore } from "./storage/GoogleDriveAssetStore";
import { ProgressReporter } from "./upload/ProgressReporter";
import { UploadPipeline } from "./upload/UploadPipeline";
import { ExpiringSet } from "./utils/cache";

function readConfig(): EnvConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ event: 'CONFIG_INVALID', issues: error.issues }, "❌ Missing or invalid environment variables");
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();

if (!config.GOOGLE_SERVICE_ACCOUNT_JSON) {
  logger.warn({ event: 'DRIVE_CREDENTIALS_MISSING' }, "⚠️ GOOGLE_SERVICE_ACCOUNT_JSON is not set; uploads will be refused at finalize");
}

const graph = createGraphClient({
  accessToken: config.WHATSAPP_ACCESS_TOKEN,
  graphVersion: config.GRAPH_API_VERSION,
  logger,
});

// Built on first finalize so bad credentials surface in the conversation, not at boot
let driveStore: GoogleDriveAssetStore | undefined;
const pipeline = new UploadPipeline({
  connectStore: () => (driveStore ??= GoogleDriveAssetStore.fromServiceAccount(config.GOOGLE_SERVICE_ACCOUNT_JSON, logger)),
  photos: new WhatsAppMediaSource(graph, config.MEDIA_MAX_BYTES, logger),
  rootFolderId: config.GOOGLE_DRIVE_ROOT_FOLDER_ID,
  concurrency: config.UPLOAD_CONCURRENCY,
  logger,
});

const dispatcher = new ConversationDispatcher({
  sessions: new SessionStore(createSessionAdapter(config, logger), config.SESSION_TTL_SECONDS, logger),
  machine: new CollectionStateMachine(),
  outbound: new WhatsAppClient(graph, config.WHATSAPP_PHONE_NUMBER_ID, logger),
  pipeline,
  reporter: new ProgressReporter({ every: config.PROGRESS_EVERY }),
  logger,
});

const app = createApp({
  verifyToken: config.VERIFY_TOKEN,
  appSecret: config.APP_SECRET,
  dispatcher,
  logger,
  seen: new ExpiringSet(config.IDEMPOTENCY_TTL_SECONDS * 1000),
});

app.listen(config.PORT, () => logger.info(`Webhook listening on :${config.PORT}`));
