export {
  ConfigStore,
  DEFAULT_SETTINGS,
  SettingsSchema,
  SettingsPatchSchema,
  defaultConfigPath,
  type Settings,
  type SettingsPatch,
  type SettingsSnapshot,
} from "./config/index.js";
export * from "./providers/index.js";
export {
  RequestDispatcher,
  PENDING_PLACEHOLDER,
  type PendingDisplay,
  type ResultSink,
  type SubmitOutcome,
} from "./core/dispatcher/requestDispatcher.js";
export { CommandQuerySchema, isKillPhrase, type CommandQuery } from "./core/schemas/index.js";
export { CommandLauncher, type AttachableSurface } from "./core/launcher/commandLauncher.js";
export { HotkeyListener, matchesHotkey, parseHotkey, type Hotkey } from "./core/hotkey/hotkeyListener.js";
export { TerminalSpotlight } from "./ui/terminalSpotlight.js";
export type { SpotlightSurface } from "./ui/spotlightSurface.js";
export { SystemClipboard, type ClipboardSink } from "./integrations/clipboard/systemClipboard.js";
export { buildControlServer, type ControlServer } from "./server/app.js";
