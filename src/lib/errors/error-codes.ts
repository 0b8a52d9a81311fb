export const ErrorCode = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  MODULE_ARGS_INVALID: 'MODULE_ARGS_INVALID',
  MODULE_PARAMS_INVALID: 'MODULE_PARAMS_INVALID',
  MODULE_OUTPUT_INVALID: 'MODULE_OUTPUT_INVALID',
  CONFIG_ENV_INVALID: 'CONFIG_ENV_INVALID',

  VCENTER_AUTH_FAILED: 'VCENTER_AUTH_FAILED',
  VCENTER_PERMISSION_DENIED: 'VCENTER_PERMISSION_DENIED',
  VCENTER_NETWORK_ERROR: 'VCENTER_NETWORK_ERROR',
  VCENTER_API_ERROR: 'VCENTER_API_ERROR',
  VCENTER_SOAP_FAULT: 'VCENTER_SOAP_FAULT',
  VCENTER_PARSE_ERROR: 'VCENTER_PARSE_ERROR',
  VCENTER_OBJECT_NOT_FOUND: 'VCENTER_OBJECT_NOT_FOUND',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];
