#!/usr/bin/env node
/**
 * RAG Field Extractor MCP Server - CLI Entry Point
 *
 * Usage:
 *   npx rag-field-extractor             # via npx
 *   rag-field-extractor                 # after npm install -g
 *   node dist/index.js                  # direct invocation
 *
 * @module bin
 */

import './index.js';
