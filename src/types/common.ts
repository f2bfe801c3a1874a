/**
 * Common type definitions shared by the Node-side adapters
 */

export type BufferSource = ArrayBuffer | ArrayBufferView;

/**
 * DOMException for Node.js
 *
 * The media-devices adapter rejects with the same names a browser uses,
 * so callers can handle both hosts with one code path.
 */
export class DOMException extends Error {
  readonly code: number;
  readonly name: string;

  constructor(message?: string, name?: string) {
    super(message);
    this.name = name || 'Error';
    this.code = this._getCode(this.name);
  }

  private _getCode(name: string): number {
    const codeMap: Record<string, number> = {
      IndexSizeError: 1,
      HierarchyRequestError: 3,
      NotFoundError: 8,
      NotSupportedError: 9,
      InvalidStateError: 11,
      AbortError: 20,
    };
    return codeMap[name] || 0;
  }
}
