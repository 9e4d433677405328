export interface ScriptArgs {
  inputPath: string;
  outputPath?: string;
  phrases?: string[];
}

/** `<input> [output] [--phrases "a,b"]` */
export function parseScriptArgs(argv: string[]): ScriptArgs {
  const positional: string[] = [];
  let phrases: string[] | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--phrases') {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error('--phrases needs a comma-separated value');
      }
      phrases = value.split(',').map((p) => p.trim()).filter(Boolean);
      i++;
    } else {
      positional.push(arg);
    }
  }

  const [inputPath, outputPath] = positional;
  if (!inputPath) {
    throw new Error('Usage: <input> [output] [--phrases "a,b"]');
  }
  return { inputPath, outputPath, phrases };
}
