#!/usr/bin/env node
/**
 * vorg Server - CLI Entry Point
 *
 * Usage:
 *   vorg-server [repository-path]     # after npm install -g
 *   node dist/bin.js [repository-path]
 *
 * @module bin
 */

import './index.js';
