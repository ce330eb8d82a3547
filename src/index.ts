#!/usr/bin/env node

import { run, handle } from '@oclif/core';

run().catch(handle);
