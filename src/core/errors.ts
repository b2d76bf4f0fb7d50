/**
 * 錯誤類別
 *
 * 啟動階段的錯誤（設定檔、排程 id、未註冊的 plugin/channel）會讓整次執行以 exit code 1 結束；
 * plugin 執行期間的錯誤則只影響單一 job。
 */

export class PushAssistantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigNotFoundError extends PushAssistantError {
  readonly path: string;

  constructor(path: string) {
    super(`config not found: ${path}`);
    this.path = path;
  }
}

export class ConfigValidationError extends PushAssistantError {}

export class ScheduleNotFoundError extends PushAssistantError {
  readonly scheduleId: string;

  constructor(scheduleId: string) {
    super(`schedule id '${scheduleId}' not found in config`);
    this.scheduleId = scheduleId;
  }
}

export class UnregisteredIdentifierError extends PushAssistantError {
  readonly kind: string;
  readonly id: string;

  constructor(kind: string, id: string) {
    super(`Unregistered ${kind}: ${id}`);
    this.kind = kind;
    this.id = id;
  }
}

export class PluginConfigError extends PushAssistantError {
  readonly pluginId: string;
  readonly issues: string[];

  constructor(pluginId: string, issues: string[]) {
    super(`plugin '${pluginId}' config invalid: ${issues.join('; ')}`);
    this.pluginId = pluginId;
    this.issues = issues;
  }
}
