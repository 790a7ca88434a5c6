#!/usr/bin/env tsx
import { createProgram } from "./commands/main.ts";

await createProgram().parseAsync(process.argv);
