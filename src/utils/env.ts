const ENV_PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * 將字串中的 ${VAR_NAME} 換成環境變數的值；沒有設定的變數保留原樣
 */
export function resolveEnvPlaceholders(
  raw: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  return raw.replace(ENV_PLACEHOLDER, (match, key: string) => env[key] ?? match);
}

/**
 * 讀取 API key 環境變數（去除前後空白），未設定時回傳空字串
 */
export function readApiKey(envName: string, env: NodeJS.ProcessEnv = process.env): string {
  return (env[envName] ?? '').trim();
}
