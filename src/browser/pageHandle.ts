/**
 * Element inside a rendered page. References may go stale once the page
 * re-renders; every method can reject in that case.
 */
export interface ElementRef {
  attribute(name: string): Promise<string | null>;
  /** Reads an attribute of the element's immediate parent. */
  parentAttribute(name: string): Promise<string | null>;
  isVisible(): Promise<boolean>;
  click(): Promise<void>;
}

/**
 * Capabilities the scraper needs from a browser session. Only one caller
 * drives a handle at a time.
 */
export interface RenderedPageHandle {
  navigate(url: string): Promise<void>;
  findAll(selector: string): Promise<ElementRef[]>;
  find(selector: string): Promise<ElementRef | null>;
  /** Runs `source` in the page; `arguments[i]` inside it is `elements[i]`. */
  runScript(source: string, ...elements: ElementRef[]): Promise<unknown>;
  pageMarkup(): Promise<string>;
  close(): Promise<void>;
}

export type SessionFactory = () => Promise<RenderedPageHandle>;
