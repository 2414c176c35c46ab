import createDebug from "debug";
import type { InjectionInterceptor, ResourceName } from "@wirebox/types";
import { Injector } from "../di/injector";

const debug = createDebug("wirebox:core:factory");

export type CreateOptions = {
  /** Registered in order before anything is resolved. */
  interceptors?: InjectionInterceptor[];
  /** Resources to produce up front; `true` for every provider. */
  preload?: true | ResourceName[];
};

export class InjectorFactory {
  static create(modules: object[], options?: CreateOptions): Injector {
    debug("create: %d modules", modules.length);
    const injector = new Injector(...modules);

    const interceptors = options?.interceptors ?? [];
    for (const interceptor of interceptors) {
      injector.addInjectionInterceptor(interceptor);
    }
    debug("create: %d interceptors", interceptors.length);

    if (options?.preload === true) {
      injector.preload();
    } else if (options?.preload) {
      injector.preload(...options.preload);
    }

    return injector;
  }
}
