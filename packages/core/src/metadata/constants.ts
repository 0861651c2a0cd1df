export const INJECTABLE_METADATA = "scopebound:injectable";
export const LIFETIME_METADATA = "scopebound:lifetime";
export const INJECT_METADATA = "scopebound:inject";

export const CONTROLLER_METADATA = "scopebound:controller";
export const HTTP_METHOD_METADATA = "scopebound:http-method";
export const ROUTE_PATH_METADATA = "scopebound:route-path";
export const PARAM_METADATA = "scopebound:params";

export const INJECTED_PARAM_METADATA = "scopebound:injected-params";
export const HANDLER_DESCRIPTOR_METADATA = "scopebound:handler-descriptor";
export const INNER_HANDLER_METADATA = "scopebound:inner-handler";
