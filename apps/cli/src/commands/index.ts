import Accept from './accept.js';
import Fetch from './fetch.js';
import Peers from './peers.js';
import Reject from './reject.js';
import Send from './send.js';
import Serve from './serve.js';
import Transfers from './transfers.js';

export const COMMANDS = {
  accept: Accept,
  fetch: Fetch,
  peers: Peers,
  reject: Reject,
  send: Send,
  serve: Serve,
  transfers: Transfers,
};
