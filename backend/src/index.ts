import { createApp } from "./app.js";
import { resolveDataRoot } from "./config/paths.js";
import { loadAuthSettings, loadServerPort, validateSecurityConfig, type AuthSettings } from "./config/settings.js";
import { logError, logInfo } from "./observability/logger.js";

// Configuration errors are fatal; nothing is served with a bad secret.
function loadSettingsOrExit(): { settings: AuthSettings; port: number } {
  try {
    const loaded = loadAuthSettings(process.env);
    validateSecurityConfig(loaded);
    return { settings: loaded, port: loadServerPort(process.env) };
  } catch (error) {
    logError("server.startup.failed", { data: { error: error instanceof Error ? error.message : String(error) } });
    process.exit(1);
  }
}

const { settings, port: PORT } = loadSettingsOrExit();

const app = createApp({ settings, dataRoot: resolveDataRoot() });

app.listen(PORT, () => {
  logInfo("server.started", {
    data: {
      port: PORT,
      jwt_auth: settings.enableJwtAuth,
      root_users: settings.rootUsers.length,
      admin_users: settings.adminUsers.length,
      jwks: Boolean(settings.jwkSetUri)
    }
  });
});
