#!/usr/bin/env tsx

import { runDeployOvfTemplate } from './module';

import { runModuleMain } from '@/lib/module/run';

process.exitCode = await runModuleMain({ service: 'content-deploy-ovf-template', run: runDeployOvfTemplate });
