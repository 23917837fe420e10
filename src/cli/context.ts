import { loadAppContext, type AppContext } from "../app/context.js";
import { createAnsiFormatter, resolveColorEnabled } from "../core/error-format.js";

export type GlobalCliOptions = {
  config?: string;
  debug?: boolean;
};

/** Loads the context for a command and echoes every mutating git command to stdout. */
export async function loadCliContext(globals: GlobalCliOptions): Promise<AppContext> {
  const format = createAnsiFormatter(resolveColorEnabled({ stream: process.stdout }));
  return loadAppContext({
    explicitConfigPath: globals.config,
    onCommand: ({ args }) => {
      console.log(format(`git ${args.join(" ")}`, ["bold"]));
    },
  });
}

/** Runs `fn` with a loaded context and always closes the run log. */
export async function withCliContext<T>(
  globals: GlobalCliOptions,
  fn: (ctx: AppContext) => Promise<T>,
): Promise<T> {
  const ctx = await loadCliContext(globals);
  try {
    return await fn(ctx);
  } finally {
    ctx.logger.close();
  }
}
