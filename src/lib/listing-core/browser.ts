/**
 * ═══════════════════════════════════════════════════════════════════════════
 * LISTING CORE - BROWSER SESSION CAPABILITY
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The retriever only depends on `BrowserSession`: navigate, scroll, pause,
 * wait-for-marker, read content, dispose. Implementations live outside the
 * core (see `src/services/playwrightSession.ts`) and are injected through
 * `RetrieverDeps.browserFactory`.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

export interface BrowserSessionOptions {
  userAgent: string;
  viewport: { width: number; height: number };
}

export interface BrowserSession {
  navigate(url: string, timeoutMs: number): Promise<void>;
  scroll(deltaY: number): Promise<void>;
  pause(ms: number): Promise<void>;
  /**
   * @returns false when the marker did not appear within the timeout
   */
  waitForMarker(selector: string, timeoutMs: number): Promise<boolean>;
  content(): Promise<string>;
  dispose(): Promise<void>;
}

export type BrowserSessionFactory = (options: BrowserSessionOptions) => Promise<BrowserSession>;
