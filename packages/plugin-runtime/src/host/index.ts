export {
  staticHostResolver,
  executableHostResolver,
  createHostResolver,
  DEFAULT_HOST_EXECUTABLES,
  type HostExecutableTable,
  type ExecutableHostResolverOptions,
  type HostResolverConfig,
} from './resolvers.js';
