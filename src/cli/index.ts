#!/usr/bin/env node

import { createProgram, VERSION } from "./program.js";
import { banner, intro, styledHelp } from "./utils.js";

const program = createProgram();

// --- no args: banner + help ---
if (process.argv.length <= 2) {
  if (process.stdout.isTTY) {
    console.log(intro());
  } else {
    console.log(banner(VERSION));
  }
  console.log(
    styledHelp(
      VERSION,
      program.commands.map((c) => ({ name: c.name(), description: c.description() }))
    )
  );
} else {
  await program.parseAsync();
}
