import { Flags } from '@oclif/core';
import { DEFAULT_API } from './api-client.js';

/** Flags shared by the commands that talk to a running node */
export const clientFlags = {
  api: Flags.string({
    description: 'Base URL of the local node',
    env: 'LANBEAM_API',
    default: DEFAULT_API,
  }),
  debug: Flags.boolean({
    description: 'Enable debug logging',
    default: false,
  }),
};
