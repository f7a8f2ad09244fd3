// ============================================================================
// @routeconf/router: Load-time errors
// ============================================================================

/** What went wrong while compiling a path template. */
export type RoutePatternErrorCode =
  | 'malformed-path'
  | 'unbalanced-braces'
  | 'empty-param-name'
  | 'invalid-param-name'
  | 'duplicate-param'
  | 'invalid-constraint';

/** What went wrong while loading a route source. */
export type RouteLoadErrorCode =
  | RoutePatternErrorCode
  | 'malformed-line'
  | 'unknown-method'
  | 'malformed-action'
  | 'unreadable-source';

/**
 * Thrown by `compilePath` for a template it cannot compile.
 */
export class RoutePatternError extends Error {
  code: RoutePatternErrorCode;
  template: string;

  constructor(
    code: RoutePatternErrorCode,
    message: string,
    template: string,
    options?: { cause?: unknown },
  ) {
    super(`${message} in '${template}'`, options);
    this.name = 'RoutePatternError';
    this.code = code;
    this.template = template;
  }
}

/**
 * Thrown by the loader. Always fatal: no route table is produced.
 */
export class RouteFileParseError extends Error {
  code: RouteLoadErrorCode;
  filename: string;
  /** 1-based line, or 0 when the source could not be read at all. */
  line: number;

  constructor(
    code: RouteLoadErrorCode,
    message: string,
    filename: string,
    line: number,
    options?: { cause?: unknown },
  ) {
    super(line > 0 ? `${filename}:${line} ${message}` : `${filename}: ${message}`, options);
    this.name = 'RouteFileParseError';
    this.code = code;
    this.filename = filename;
    this.line = line;
  }
}

/**
 * Thrown by `parseAction` for text that is not `Controller.method` with an
 * optional `(key:'value', ...)` argument list.
 */
export class RouteActionError extends Error {
  action: string;

  constructor(message: string, action: string) {
    super(`${message} in action '${action}'`);
    this.name = 'RouteActionError';
    this.action = action;
  }
}
