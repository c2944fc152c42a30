#!/usr/bin/env tsx
import { CLI } from "./cli";
import { RenderPipeline } from "./render-pipeline";

const cli = new CLI(new RenderPipeline());
const exitCode = await cli.run(process.argv.slice(2));
process.exit(exitCode);
