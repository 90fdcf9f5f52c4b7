#!/usr/bin/env node

import { runCli } from "./program"

runCli(process.argv)
    .then(code => {
        process.exitCode = code
    })
    .catch((e: unknown) => {
        console.error(e)
        process.exitCode = 1
    })
