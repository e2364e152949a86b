export interface ErrorLocation {
  file: string;
  line: number;
  column: number;
}

/**
 * First stack frame outside the error constructors and dependencies.
 */
export function stackLocation(stack: string): ErrorLocation | undefined {
  for (const line of stack.split('\n')) {
    if (!line.trimStart().startsWith('at ')) continue;
    if (line.includes('node_modules') || /at new \w*Error /.test(line)) continue;

    const match =
      line.match(/at .+? \((.+?):(\d+):(\d+)\)/) || line.match(/at (.+?):(\d+):(\d+)/);

    if (match?.[1] && match[2] && match[3]) {
      return {
        file: match[1],
        line: Number.parseInt(match[2], 10),
        column: Number.parseInt(match[3], 10),
      };
    }
  }
  return undefined;
}

/**
 * Base error class for all hueplot errors.
 * Provides formatted error output with location tracking and hints.
 */
export class HueplotError extends Error {
  readonly hint?: string;
  readonly location?: ErrorLocation;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'HueplotError';
    this.hint = hint;
    this.location = this.stack ? stackLocation(this.stack) : undefined;
  }

  format(): string {
    const lines: string[] = [];

    const loc = this.location
      ? ` at ${this.location.file.split('/').slice(-1)[0]}:${this.location.line}:${this.location.column}`
      : '';

    lines.push(`error: ${this.message}${loc}`);
    lines.push(`  --> ${this._getExpression()}`);
    lines.push('   |');
    lines.push(`   └── ${this._getDetail()}`);

    if (this.hint) {
      lines.push('');
      lines.push(`help: ${this.hint}`);
    }

    return lines.join('\n');
  }

  protected _getExpression(): string {
    return '(expression)';
  }

  protected _getDetail(): string {
    return this.message;
  }
}
