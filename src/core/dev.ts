/**
 * Runtime configuration and developer diagnostics.
 *
 * Warnings are only printed in dev mode. Errors are always printed.
 */

export interface HoldfastConfig {
  /** Print developer warnings. Default: true. */
  devMode: boolean;

  /**
   * Warn when a controlled `<input>` has no `type` attribute at mount time.
   * Default: true.
   */
  warnOnUntypedInput: boolean;
}

const config: HoldfastConfig = {
  devMode: true,
  warnOnUntypedInput: true,
};

/**
 * Update runtime configuration. Unspecified keys keep their current values.
 *
 * Example:
 * ```ts
 * configure({ devMode: process.env.NODE_ENV !== 'production' });
 * ```
 */
export function configure(options: Partial<HoldfastConfig>): void {
  Object.assign(config, options);
}

export function getConfig(): Readonly<HoldfastConfig> {
  return { ...config };
}

/** Dev mode warning helper */
export function warn(message: string): void {
  if (config.devMode) {
    console.warn(`[Holdfast] ${message}`);
  }
}
