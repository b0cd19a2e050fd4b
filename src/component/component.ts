/***
 *
 * Component — Class-keyed component types
 *
 * A component is a plain data class. The class object itself is the
 * runtime type identifier: the registry keys its pools by it and
 * creates the pool the first time the class is used, so component
 * types need no up-front registration.
 *
 *   class Position { constructor(public x = 0, public y = 0) {} }
 *   registry.add_component(e, Position, 1, 2);
 *
 * ComponentType<T> accepts any constructor producing T. The never[]
 * parameter list makes every constructor assignable regardless of its
 * own parameters; operations that construct (add_component,
 * get_or_add) ask for the precise signature instead.
 *
 ***/

export type ComponentType<T = unknown> = new (...args: never[]) => T;

/** A component class together with the arguments used to build it. */
export type ComponentClass<T, A extends unknown[]> = ComponentType<T> &
  (new (...args: A) => T);

/** A component class that can be built with no arguments. */
export type DefaultConstructible<T> = new () => T;

/** Maps a tuple of component classes to a tuple of their instances. */
export type ComponentsOf<Types extends readonly ComponentType[]> = {
  -readonly [K in keyof Types]: Types[K] extends ComponentType<infer C>
    ? C
    : never;
};

export const component_name = (type: ComponentType): string =>
  type.name || "<anonymous component>";
