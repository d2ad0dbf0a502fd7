import { DebugCategory, DebugConfig } from '../context/types';

export const DEFAULT_DEBUG_CONFIG: DebugConfig = {
  enabled: false,
  categories: {
    [DebugCategory.Request]: true,
    [DebugCategory.Store]: true,
    [DebugCategory.Apply]: true,
    [DebugCategory.Focus]: true,
    [DebugCategory.Debounce]: false,
    [DebugCategory.Trigger]: false,
  },
  maxPayloadLength: 500,
};

type BaseLogger = { info: (msg: string) => void };

export class DebugLogger {
  private config: DebugConfig;

  constructor(
    private readonly baseLogger: BaseLogger,
    config?: Partial<DebugConfig>
  ) {
    this.config = { ...DEFAULT_DEBUG_CONFIG };
    if (config) {
      this.configure(config);
    }
  }

  /**
   * Update debug configuration
   */
  configure(config: Partial<DebugConfig>): void {
    this.config = {
      ...this.config,
      ...config,
      categories: { ...this.config.categories, ...config.categories },
    };
  }

  isCategoryEnabled(category: DebugCategory): boolean {
    return this.config.enabled && (this.config.categories[category] ?? false);
  }

  /**
   * Log a debug message for a specific category
   */
  log(category: DebugCategory, message: string, data?: unknown): void {
    if (!this.isCategoryEnabled(category)) {
      return;
    }

    let fullMessage = `[DEBUG:${category}] ${message}`;
    if (data !== undefined) {
      fullMessage += ` ${this.formatData(data)}`;
    }

    this.baseLogger.info(fullMessage);
  }

  /**
   * Format data for logging, truncated to `maxPayloadLength`
   */
  private formatData(data: unknown): string {
    let jsonStr: string | undefined;
    try {
      jsonStr = JSON.stringify(data);
    } catch {
      return String(data);
    }
    if (jsonStr === undefined) {
      return String(data);
    }
    if (jsonStr.length <= this.config.maxPayloadLength) {
      return jsonStr;
    }
    return jsonStr.slice(0, this.config.maxPayloadLength) + '...[truncated]';
  }
}
