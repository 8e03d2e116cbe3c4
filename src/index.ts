#!/usr/bin/env node
import * as core from '@actions/core';
import { createContext, main } from './cli';

async function run(): Promise<void> {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    const argv = process.argv.slice(2);
    await main(argv, createContext(argv, controller.signal));
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed('An unexpected error occurred');
    }
  }
}

void run();
