import { createApp } from "./app.js";
import type { EditableConfig } from "./editableConfig.js";
import { NotFoundError } from "./errors.js";
import { loadExplanations } from "./explanations.js";
import { loadSettings } from "./settings.js";
import { SshConfig } from "./sshConfig.js";
import { SshdConfig } from "./sshdConfig.js";

/**
 * Load a config and make sure a restore point exists. A missing file is
 * reported and left empty so the other config stays editable.
 */
function openConfig<T extends EditableConfig>(config: T): T {
  try {
    config.load();
    config.ensureBackup();
  } catch (error) {
    if (!(error instanceof NotFoundError)) throw error;
    console.warn(`[Server] ${error.message}; starting with an empty document`);
  }
  return config;
}

const settings = loadSettings();

const app = createApp(settings, {
  sshd: openConfig(new SshdConfig(settings.sshdConfigPath)),
  ssh: openConfig(new SshConfig(settings.sshConfigPath)),
  explanations: loadExplanations(settings.explanationsFile),
});

app.listen(settings.port, () => {
  console.log(`[Server] Config editor listening on http://0.0.0.0:${settings.port}`);
  console.log(`[Server] sshd_config: ${settings.sshdConfigPath}, ssh_config: ${settings.sshConfigPath}`);
});
