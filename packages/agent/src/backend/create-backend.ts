import type { Config } from '../config.js';
import type { Backend } from './base.js';
import { HttpBackend } from './http.js';
import { StdioBackend } from './stdio.js';

export function createBackend(transport: Config['transport']): Backend {
  switch (transport) {
    case 'stdio':
      return new StdioBackend();
    case 'http':
      return new HttpBackend();
  }
}
