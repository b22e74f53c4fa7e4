#!/usr/bin/env node

import { buildProgram } from './cli/program';

buildProgram().parse(process.argv);
