import { controllerErrors } from './controller-errors.js';
import * as DomApi from './dom-api.js';
import type { Modifier, ReactiveElement } from './element.js';
import {
  checkedConfig,
  controllableProps,
  resolveElementKind,
  selectValueConfig,
  textValueConfig,
  type InputControllerConfig,
} from './input-config.js';
import { InputController } from './input-controller.js';
import { typ } from './keys.js';
import type { EventListener, PropUpdater } from './modifiers.js';

/**
 * Make a form control's property controlled: `updater` is the single source
 * of truth for it, and user input only reaches the app through `listener`.
 *
 * Configuration mistakes that can be detected right away throw here. The rest
 * (duplicate controllers, conflicting binders, a `type` that does not match
 * the prop or event) throw when the element mounts.
 *
 * @example
 * ```ts
 * const zip = signal('');
 * el(input, setAttr(typ, 'text'), controlled(
 *   bindProp(value, zip),
 *   listen(on(onInput).mapToValue().filter((v) => /^\d*$/.test(v)), zip.set)
 * ));
 * ```
 */
export function controlled<V, Ev extends Event, Out>(
  updater: PropUpdater<V>,
  listener: EventListener<Ev, Out>
): Modifier {
  return {
    apply(element: ReactiveElement) {
      const propDomName = updater.key.name;
      const props = controllableProps(element);

      if (!props) {
        throw controllerErrors.notControllable(element.ref, propDomName);
      }
      if (!props.includes(propDomName)) {
        throw controllerErrors.unknownProperty(element.ref, propDomName, props);
      }

      const config = resolveConfig(element, propDomName);
      if (!config) {
        throw controllerErrors.unsupportedElement(element.ref, propDomName);
      }

      const controller = new InputController<unknown, Ev, Out>(config, element, updater, listener);
      controller.bind();
    },
  };
}

function resolveConfig(element: ReactiveElement, propDomName: string): InputControllerConfig<unknown> | undefined {
  const kind = resolveElementKind(element);
  switch (kind.kind) {
    case 'custom':
      return kind.tag?.controllerConfigs(element.ref).find((config) => config.prop.name === propDomName);
    case 'input':
      // File inputs can not be set programmatically.
      if (DomApi.getHtmlAttributeRaw(element.ref, typ)?.toLowerCase() === 'file') {
        return undefined;
      }
      return propDomName === 'checked' ? checkedConfig : textValueConfig;
    case 'select':
      return selectValueConfig;
    case 'textarea':
      return textValueConfig;
    case 'other':
      return undefined;
  }
}
