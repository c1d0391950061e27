#!/usr/bin/env node
import { runMain } from 'citty'
import { root, withDefaultCommand } from './index.js'

void runMain(root, { rawArgs: withDefaultCommand(process.argv.slice(2)) })
