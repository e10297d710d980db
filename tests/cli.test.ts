import { formatOutline, parseArgs } from '../src/cli';

describe('parseArgs', () => {
  it('should default to check mode', () => {
    expect(parseArgs(['generated.ts'])).toEqual({
      ok: true,
      args: {
        mode: 'check',
        inputFile: 'generated.ts',
        generatedFile: undefined,
        configPath: undefined,
        write: false,
      },
    });
  });

  it('should parse merge mode with write', () => {
    const result = parseArgs(['generated.ts', '--merge', 'generated.ts.new', '--write']);

    expect(result).toEqual({
      ok: true,
      args: {
        mode: 'merge',
        inputFile: 'generated.ts',
        generatedFile: 'generated.ts.new',
        configPath: undefined,
        write: true,
      },
    });
  });

  it('should accept short options', () => {
    const result = parseArgs(['-c', 'conf.json', 'a.txt', '-m', 'b.txt', '-w']);

    expect(result).toEqual({
      ok: true,
      args: {
        mode: 'merge',
        inputFile: 'a.txt',
        generatedFile: 'b.txt',
        configPath: 'conf.json',
        write: true,
      },
    });
  });

  it('should parse list and trim modes', () => {
    expect(parseArgs(['a.txt', '--list'])).toMatchObject({ ok: true, args: { mode: 'list' } });
    expect(parseArgs(['--trim', 'a.txt'])).toMatchObject({ ok: true, args: { mode: 'trim' } });
  });

  it('should signal help without an error', () => {
    expect(parseArgs(['a.txt', '--help'])).toEqual({ ok: false, error: null });
    expect(parseArgs(['-h'])).toEqual({ ok: false, error: null });
  });

  it('should reject conflicting modes', () => {
    expect(parseArgs(['a.txt', '--list', '--trim'])).toEqual({
      ok: false,
      error: 'Conflicting modes: --list and --trim',
    });
  });

  it('should allow repeating the same mode', () => {
    expect(parseArgs(['a.txt', '--list', '--list'])).toMatchObject({ ok: true });
  });

  it('should require option values', () => {
    expect(parseArgs(['a.txt', '--merge'])).toEqual({
      ok: false,
      error: '--merge requires a path argument',
    });
    expect(parseArgs(['a.txt', '--config'])).toEqual({
      ok: false,
      error: '--config requires a path argument',
    });
  });

  it('should reject unknown options and extra arguments', () => {
    expect(parseArgs(['a.txt', '--force'])).toEqual({ ok: false, error: 'Unknown option: --force' });
    expect(parseArgs(['a.txt', 'b.txt'])).toEqual({ ok: false, error: 'Unexpected argument: b.txt' });
  });

  it('should not treat prototype keys as modes', () => {
    expect(parseArgs(['a.txt', 'constructor'])).toEqual({
      ok: false,
      error: 'Unexpected argument: constructor',
    });
  });

  it('should require an input file', () => {
    expect(parseArgs(['--list'])).toEqual({ ok: false, error: 'Input file required' });
  });

  it('should only allow --write when editing', () => {
    expect(parseArgs(['a.txt', '--write'])).toEqual({
      ok: false,
      error: '--write is only supported with --trim and --merge',
    });
    expect(parseArgs(['a.txt', '--trim', '--write'])).toMatchObject({
      ok: true,
      args: { mode: 'trim', write: true },
    });
  });
});

describe('formatOutline', () => {
  it('should indent nested sections by two spaces per level', () => {
    const lines = formatOutline([
      {
        name: '1',
        children: [
          { name: '1.1', children: [{ name: '1.1.1', children: [] }] },
          { name: '1.2', children: [] },
        ],
      },
      { name: '2', children: [] },
    ]);

    expect(lines).toEqual(['1', '  1.1', '    1.1.1', '  1.2', '2']);
  });

  it('should return no lines for an empty outline', () => {
    expect(formatOutline([])).toEqual([]);
  });
});

describe('direct invocation', () => {
  const originalArgv = process.argv;

  afterEach(() => {
    process.argv = originalArgv;
    process.exitCode = undefined;
    jest.restoreAllMocks();
  });

  function loadCli(argv: string[]): string[] {
    const messages: string[] = [];
    jest.spyOn(console, 'error').mockImplementation((message: unknown) => {
      messages.push(String(message));
    });
    process.argv = argv;
    jest.isolateModules(() => {
      require('../src/cli');
    });
    return messages;
  }

  it('should run when started through the installed bin link', () => {
    const messages = loadCli([
      'node',
      '/usr/lib/node_modules/mcp-section-editor/node_modules/.bin/section-edit',
      '--help',
    ]);

    expect(messages.some((message) => message.includes('Usage: section-edit <file>'))).toBe(true);
    expect(process.exitCode).toBe(0);
  });

  it('should run when started from the compiled script', () => {
    const messages = loadCli(['node', '/opt/app/dist/src/cli.js', '-h']);

    expect(messages.some((message) => message.includes('Usage: section-edit <file>'))).toBe(true);
  });

  it('should not run when imported by another script', () => {
    const messages = loadCli(['node', '/opt/app/dist/src/index.js', '--help']);

    expect(messages).toEqual([]);
  });
});
