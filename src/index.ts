// Audio Frame Integrity Gateway - Entry point
// Loads configuration, wires the recognition sink and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import { createConsoleLogger } from "./logger.js";
import { describePolicy, loadPolicyConfig } from "./policy-config.js";
import { createAppServer } from "./server.js";
import { TranscriptionEngine } from "./transcription-engine.js";
import type { PolicyConfig } from "./types.js";

export const APP_NAME = "Audio Frame Integrity Gateway";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

const port = parseInt(process.env.PORT || "8012", 10);

// ─── Validate configuration ─────────────────────────────────────────────────────

const deepgramKey = process.env.DEEPGRAM_API_KEY;

if (!deepgramKey) {
  logFatal("DEEPGRAM_API_KEY is not set. Add it to your .env file.");
  process.exit(1);
}

function loadPolicyOrExit(): PolicyConfig {
  try {
    return loadPolicyConfig(process.env);
  } catch (err) {
    logFatal(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

const policy = loadPolicyOrExit();

logInit(`Integrity policy: ${describePolicy(policy)}`);

// ─── Initialize recognition sink ────────────────────────────────────────────────

logInit("Creating Deepgram client...");
const deepgramClient = createDeepgramClient(deepgramKey);

logInit("Initializing TranscriptionEngine (Deepgram live)...");
const transcriptionEngine = new TranscriptionEngine(deepgramClient);

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  audioSink: transcriptionEngine,
  policy,
  logger: createConsoleLogger({ verbose: policy.extendedLogging }),
});

server
  .listen(port)
  .then(() => {
    logInit(`${APP_NAME} v${APP_VERSION} accepting audio frames at ws://localhost:${port}`);
    logInit("Ready for connections");
  })
  .catch((err: unknown) => {
    logFatal(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
