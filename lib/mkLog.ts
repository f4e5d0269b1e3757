import * as core from '@actions/core';

export type Log = (msg: string) => void;

export function mkLog(prefix: string, write: Log = core.info): Log {
  return (msg: string) => {
    write(`[${prefix}]: ${msg}`);
  };
}
