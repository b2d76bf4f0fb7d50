export type MessageFormat = 'text' | 'markdown' | 'html';

/**
 * Plugin 與 channel 之間傳遞的訊息
 *
 * plugin 通常不填 targetRecipient，由 runner 補上 job 的 recipient。
 */
export interface PushMessage {
  readonly title: string;
  readonly body: string;
  readonly format: MessageFormat;
  readonly targetRecipient?: string | null;
  readonly priority?: string | null;
  readonly tags?: readonly string[] | null;
}

/**
 * 每次執行 job 時建立的 context，plugin 只能讀取
 */
export interface PluginContext {
  readonly now: Date;
  readonly recipientId: string;
  readonly pluginConfig: Readonly<Record<string, unknown>>;
  readonly globalConfig: Readonly<Record<string, unknown>>;
}

export interface ContentPlugin {
  readonly id: string;
  run(ctx: PluginContext): Promise<PushMessage[]>;
}

/**
 * 回傳填好收件者的新訊息，不修改原本的物件
 */
export function withTargetRecipient(message: PushMessage, recipientId: string): PushMessage {
  return { ...message, targetRecipient: recipientId };
}
