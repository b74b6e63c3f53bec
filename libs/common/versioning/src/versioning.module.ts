/**
 * Todos API Versioning Module
 * Builds the version dispatch table once, at startup
 */

import { DynamicModule, Module } from '@nestjs/common';
import { VersionedDispatcher } from './versioned-dispatcher';
import { VersionBinding, VersionedDispatcherOptions } from './versioning.types';

export interface ApiVersioningOptions<TGroup> extends VersionedDispatcherOptions {
  routes: Readonly<Record<string, readonly VersionBinding<TGroup>[]>>;
  /**
   * Extra per-binding check run during registration (throw to abort startup).
   */
  validateBinding?: (route: string, binding: VersionBinding<TGroup>) => void;
}

@Module({})
export class ApiVersioningModule {
  static forRoot<TGroup>(options: ApiVersioningOptions<TGroup>): DynamicModule {
    return {
      module: ApiVersioningModule,
      global: true,
      providers: [
        {
          provide: VersionedDispatcher,
          useFactory: () => {
            const dispatcher = new VersionedDispatcher<TGroup>({
              strictOrdering: options.strictOrdering,
            });
            for (const [route, bindings] of Object.entries(options.routes)) {
              for (const binding of bindings) {
                options.validateBinding?.(route, binding);
              }
              dispatcher.register(route, bindings);
            }
            return dispatcher;
          },
        },
      ],
      exports: [VersionedDispatcher],
    };
  }
}
