import 'reflect-metadata';
export { run } from '@oclif/core';
export * from './common/config/loader';
export * from './common/config/stack-config';
export * from './common/errors/lifecycle-errors';
export * from './common/errors/routing-errors';
export * from './common/errors/runtime-errors';
export * from './common/lifecycle/deployment-lock';
export * from './common/lifecycle/network-provisioner';
export * from './common/lifecycle/orchestrator';
export * from './common/lifecycle/service-state';
export * from './common/lifecycle/state-inspector';
export * from './common/lifecycle/topology';
export * from './common/routing/health-prober';
export * from './common/routing/proxy-server';
export * from './common/routing/rate-limiter';
export * from './common/routing/routing-table';
export * from './common/routing/upstream-pool';
export * from './common/runtime/docker-runtime';
export * from './common/runtime/runtime';
export * from './common/utils/dictionary';
export * from './common/utils/errors';
export * from './common/utils/logger';
