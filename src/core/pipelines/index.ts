export { bindKeyArguments } from './key-arguments.js';
export type { DescribeOptions, DescribeResult } from './describe-pipeline.js';
export { describeConfiguration } from './describe-pipeline.js';
export type { ConfigureOptions, ConfigureResult } from './configure-pipeline.js';
export { configureApplication } from './configure-pipeline.js';
export type { ListKeysOptions, ListKeysResult } from './list-keys-pipeline.js';
export { listKeys } from './list-keys-pipeline.js';
