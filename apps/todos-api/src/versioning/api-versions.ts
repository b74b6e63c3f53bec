/**
 * API versions served per route.
 * Non-default versions first, the default version last.
 */

import { Type } from '@nestjs/common';
import { VERSION_METADATA } from '@nestjs/common/constants';
import { VersionBinding, VersionConfigurationError } from '@todos/common/versioning';
import { ItemsController } from '../items/items.controller';
import { TodosController } from '../todos/todos.controller';
import { TodosV2Controller } from '../todos/todos-v2.controller';

export type ControllerGroup = readonly Type<unknown>[];

export const API_VERSION_ROUTES: Readonly<Record<string, readonly VersionBinding<ControllerGroup>[]>> = {
  todos: [
    { version: 'v2', isDefault: false, group: [TodosV2Controller] },
    { version: 'v1', isDefault: true, group: [TodosController, ItemsController] },
  ],
};

/**
 * Every controller of a binding must be declared with the binding's version,
 * otherwise Nest would never route the dispatched version to it.
 */
export function assertControllerVersions(
  route: string,
  binding: VersionBinding<ControllerGroup>,
): void {
  for (const controller of binding.group) {
    const declared: unknown = Reflect.getMetadata(VERSION_METADATA, controller);
    if (declared !== binding.version) {
      throw new VersionConfigurationError(
        route,
        `${controller.name} is declared with version '${String(declared)}', expected '${binding.version}'`,
      );
    }
  }
}
