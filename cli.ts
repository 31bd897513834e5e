import 'dotenv/config'

import { runCli } from './src/cli/run.ts'

const code = runCli(process.argv.slice(2), {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
})

process.exitCode = code
