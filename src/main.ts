#!/usr/bin/env node
import { program } from "./cli/cli.js";

await program.parseAsync(process.argv);
