import type { ContentPlugin, PluginContext, PushMessage } from '../core/models.js';

/**
 * 固定回傳一則文字訊息，用來驗證 runner 與 channel 設定
 */
export class PlaceholderPlugin implements ContentPlugin {
  readonly id = 'placeholder';

  async run(_ctx: PluginContext): Promise<PushMessage[]> {
    return [
      {
        title: 'Test',
        body: 'Hello from Push Assistant',
        format: 'text',
        targetRecipient: null,
      },
    ];
  }
}
