import { hideBin } from "yargs/helpers";
import { runTranscribeCli } from "./main";
import { closeLogFile } from "../pipeline/log";

runTranscribeCli(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .finally(() => closeLogFile());
