/**
 * @fileoverview Domain DI Module Exports
 *
 * @packageDocumentation
 * @module @tessera/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Technology-agnostic DI contracts; `infrastructure/di` implements them.
 */

export {
  type ServiceIdentifier,
  type Constructor,
  type AbstractConstructor,
  type IInjectableConstructor,
  getServiceName,
  hasInjectProperty,
  getInjectDependencies,
  createToken,
  SERVICE_PROVIDER_TOKEN,
} from './service-identifier';

export {
  ServiceLifetime,
  getLifetimePriority,
  canDependOn,
  getLifetimeName,
} from './service-lifetime';

export {
  type IServiceDescriptor,
  type IServiceDescriptorOptions,
  type ServiceFactory,
  type IServiceResolver,
  createClassDescriptor,
  createFactoryDescriptor,
  createInstanceDescriptor,
  validateDescriptor,
} from './service-descriptor';

export {
  type IDisposable,
  type IServiceCollection,
  type IServiceProvider,
  type IBuildOptions,
  isDisposable,
} from './di.interface';

export {
  DIError,
  ServiceNotRegisteredError,
  CircularDependencyError,
  ScopeMismatchError,
  ServiceCreationError,
  ContainerSealedError,
  ProviderDisposedError,
} from './di.errors';
