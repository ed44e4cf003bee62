#!/usr/bin/env node
import { loadDotenv } from "./env.js";
import { createProgram } from "./program.js";

loadDotenv();

await createProgram().parseAsync(process.argv);
