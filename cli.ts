#!/usr/bin/env node
/**
 * Node.js CLI for the backpack & container viewer.
 *
 * Usage:
 *   backpack-viewer -f sophisticatedbackpacks.dat --item minecraft:flint
 *   backpack-viewer -f containers.json --ctype minecraft:chest --nodungeon
 */

import { main } from './src/cli/main';

// Main entry point
process.exitCode = main(process.argv.slice(2));
