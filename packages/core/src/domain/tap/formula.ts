const ARCHIVE_EXTENSIONS = ['.tar.gz', '.tgz', '.tar.bz2', '.tar.xz', '.zip'];

/** `my-cool_tool` -> `MyCoolTool` */
export function formulaClassName(name: string): string {
  return name
    .split(/[-_]/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}

/**
 * Guesses a formula name from a source archive URL:
 * `https://example.com/dl/widget-1.2.0.tar.gz?x=1` -> `widget`.
 */
export function deriveFormulaNameFromUrl(url: string): string | undefined {
  const withoutQuery = url.split('?')[0];
  const withoutFragment = withoutQuery.split('#')[0];
  const filename = withoutFragment.split('/').pop() ?? '';

  let base = filename;
  for (const ext of ARCHIVE_EXTENSIONS) {
    if (base.endsWith(ext)) {
      base = base.slice(0, -ext.length);
      break;
    }
  }

  const dash = base.lastIndexOf('-');
  if (dash >= 0) {
    const suffix = base.slice(dash + 1);
    if (/^[0-9v]/.test(suffix)) {
      base = base.slice(0, dash);
    }
  }

  return base || undefined;
}

export function renderStubFormula(className: string): string {
  return [
    `class ${className} < Formula`,
    '  desc "TODO: add a short description"',
    '  homepage "https://example.com"',
    '  url "https://example.com/TODO.tar.gz"',
    '  sha256 "TODO"',
    '  license "MIT"',
    '',
    '  def install',
    '    # TODO: install steps',
    '  end',
    '',
    '  test do',
    '    # TODO: add a test',
    '  end',
    'end',
    '',
  ].join('\n');
}
