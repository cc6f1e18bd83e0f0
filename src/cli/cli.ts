#!/usr/bin/env node
/**
 * kube-manifest-scan CLI
 * Discover, render and policy-scan Kubernetes manifests
 */

import { argv, env, exit } from 'node:process';
import { runCli } from './main';

void runCli(argv, env).then((code) => exit(code));
