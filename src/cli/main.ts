import yargs from "yargs";
import path from "path";
import { ENV, applyCredentialsEnv } from "../pipeline/env";
import { runPipelineForFile, RunPipelineResult } from "../pipeline/run";
import { UsageError, describeError } from "../pipeline/errors";
import { setLogFile, info, warn, error } from "../pipeline/log";

export interface CliDeps {
  run?: (sourcePath: string) => Promise<RunPipelineResult>;
}

/**
 * Runs the transcribe command for `args` (argv without node and script) and
 * resolves to the process exit code.
 */
export async function runTranscribeCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const run = deps.run ?? ((sourcePath: string) => runPipelineForFile(sourcePath));
  try {
    const argv = await yargs(args)
      .scriptName("transcribe")
      .command("$0 <input>", "Transcribe an audio file into <input>_transcript.txt", (y) =>
        y.positional("input", { type: "string", describe: "Path to the audio file", demandOption: true })
      )
      .strict()
      .help()
      .exitProcess(false)
      .fail((msg, err) => {
        throw err ?? new UsageError(msg);
      })
      .parse();

    // --help / --version
    if (!argv.input) return 0;

    if (ENV.logFile) setLogFile(ENV.logFile);

    const credentials = applyCredentialsEnv();
    if (credentials) {
      info("credentials.use", { path: credentials });
    } else {
      warn("credentials.missing", {
        hint: "Set GOOGLE_APPLICATION_CREDENTIALS=path/to/credentials.json in .env; every chunk will fail without it",
      });
    }

    const result = await run(path.resolve(argv.input));

    console.log("Transcript:", result.outputPath);
    if (result.failedChunks.length) {
      console.log(`Chunks without text: ${result.failedChunks.length}/${result.chunkCount}`);
    }
    return 0;
  } catch (e) {
    error("run.fail", { error: describeError(e) });
    return 1;
  }
}
