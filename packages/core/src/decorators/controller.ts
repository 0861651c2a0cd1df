import "reflect-metadata";
import { CONTROLLER_METADATA } from "../metadata/constants";
import { assertRoutePath } from "./http";

export type ControllerMetadata = {
  prefix?: string;
};

/**
 * Marks a class whose routed methods are registered together. Controllers are
 * constructed by the application with no arguments; handler dependencies are
 * declared per method with `@Injected`.
 */
export function Controller(prefix?: string): ClassDecorator {
  if (prefix !== undefined) assertRoutePath(prefix);
  const metadata: ControllerMetadata = prefix === undefined ? {} : { prefix };
  return (target) => {
    Reflect.defineMetadata(CONTROLLER_METADATA, metadata, target);
  };
}
