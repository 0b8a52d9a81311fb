#!/usr/bin/env tsx

import { runObjectPermissionsInfo } from './module';

import { runModuleMain } from '@/lib/module/run';

process.exitCode = await runModuleMain({ service: 'object-permissions-info', run: runObjectPermissionsInfo });
