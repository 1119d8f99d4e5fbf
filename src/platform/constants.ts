import type { RuntimeDescriptor } from './types.js';

export const PYTHON_RUNTIME: RuntimeDescriptor = {
  name: 'Python 3',
  installUrl: 'https://www.python.org/downloads/'
};

/** Written into the environment root while provisioning is unfinished */
export const PROVISIONING_MARKER = '.applaunch-provisioning.json';
