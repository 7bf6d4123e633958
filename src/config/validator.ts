import Joi from 'joi';
import { ConfigurationError, type TestbedConfig } from '../types';
import type { ConfigValidationResult } from './types';

const WILDCARD = '*';

const requiredString = (label: string) =>
  Joi.string()
    .trim()
    .min(1)
    .required()
    .messages({
      'any.required': `${label} is required`,
      'string.empty': `${label} must not be empty`
    });

const ipv4 = (label: string) =>
  Joi.string()
    .ip({ version: ['ipv4'], cidr: 'forbidden' })
    .required()
    .messages({
      'any.required': `${label} is required`,
      'string.ip': `${label} must be an IPv4 address`,
      'string.ipVersion': `${label} must be an IPv4 address`
    });

const globalSchema = Joi.object({
  developer_mode: Joi.boolean().default(false)
});

const connectionSchema = Joi.object({
  verify: Joi.boolean().default(true),
  disable_ssl_warnings: Joi.boolean().default(true)
});

const vcdSchema = Joi.object({
  host: Joi.string()
    .trim()
    .pattern(/^(https?:\/\/)?[a-zA-Z0-9.-]+(:\d+)?\/?$/)
    .required()
    .messages({
      'any.required': 'vcd.host is required',
      'string.pattern.base': 'vcd.host must be a host name, optionally with scheme and port'
    }),
  api_version: Joi.string()
    .pattern(/^\d+\.\d+$/)
    .default('31.0')
    .messages({
      'string.pattern.base': 'vcd.api_version must look like 31.0'
    }),
  sys_org_name: Joi.string().default('System'),
  sys_admin_username: requiredString('vcd.sys_admin_username'),
  sys_admin_pass: requiredString('vcd.sys_admin_pass'),
  default_org_user_password: requiredString('vcd.default_org_user_password'),
  default_pvdc_name: requiredString('vcd.default_pvdc_name'),
  default_netpool_name: Joi.string().default(WILDCARD),
  default_org_name: requiredString('vcd.default_org_name'),
  default_ovdc_name: requiredString('vcd.default_ovdc_name'),
  default_storage_profile_name: Joi.string().default(WILDCARD),
  default_network_quota: Joi.number()
    .integer()
    .min(0)
    .default(10)
    .messages({
      'number.min': 'vcd.default_network_quota must not be negative'
    }),
  default_ovdc_network_name: requiredString('vcd.default_ovdc_network_name'),
  default_ovdc_network_gateway_ip: ipv4('vcd.default_ovdc_network_gateway_ip'),
  default_ovdc_network_gateway_netmask: ipv4('vcd.default_ovdc_network_gateway_netmask'),
  default_catalog_name: requiredString('vcd.default_catalog_name'),
  default_template_file_name: Joi.string()
    .pattern(/\.ovf$/i)
    .required()
    .messages({
      'any.required': 'vcd.default_template_file_name is required',
      'string.pattern.base': 'vcd.default_template_file_name must name an .ovf descriptor'
    }),
  template_dir: Joi.string().default('.'),
  default_vapp_name: requiredString('vcd.default_vapp_name'),
  default_vm_name: requiredString('vcd.default_vm_name')
});

const vcenterSchema = Joi.object({
  vcenter_host_name: requiredString('vc.vcenter_host_name'),
  vcenter_host_ip: Joi.string().hostname().required(),
  vcenter_admin_username: requiredString('vc.vcenter_admin_username'),
  vcenter_admin_password: requiredString('vc.vcenter_admin_password')
});

const nsxSchema = Joi.object({
  nsx_hostname: requiredString('nsx.nsx_hostname'),
  nsx_host_ip: Joi.string().hostname().required(),
  nsx_admin_username: requiredString('nsx.nsx_admin_username'),
  nsx_admin_password: requiredString('nsx.nsx_admin_password')
});

const loggingSchema = Joi.object({
  default_log_filename: Joi.string().allow(null).default(null),
  default_client_log_filename: Joi.string().allow(null).default(null),
  log_requests: Joi.boolean().default(false),
  log_headers: Joi.boolean().default(false),
  log_bodies: Joi.boolean().default(false)
});

const taskMonitorSchema = Joi.object({
  poll_interval_ms: Joi.number().integer().min(0).default(5000),
  timeout_ms: Joi.number()
    .integer()
    .min(1)
    .default(600000)
    .messages({
      'number.min': 'task_monitor.timeout_ms must be positive'
    })
});

const testbedConfigSchema = Joi.object<TestbedConfig>({
  global: globalSchema.default(),
  connection: connectionSchema.default(),
  vcd: vcdSchema.required().messages({ 'any.required': 'vcd section is required' }),
  vc: vcenterSchema.optional(),
  nsx: nsxSchema.optional(),
  logging: loggingSchema.default(),
  task_monitor: taskMonitorSchema.default()
})
  .and('vc', 'nsx')
  .unknown(false);

const validationOptions: Joi.ValidationOptions = {
  abortEarly: false,
  allowUnknown: false,
  stripUnknown: false
};

/**
 * Validates a testbed configuration object against the schema
 * @param config - The configuration object to validate
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = testbedConfigSchema.validate(config, validationOptions);

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates a configuration and returns it with defaults applied
 * @throws ConfigurationError listing every problem found
 */
export function validateAndNormalizeConfig(config: unknown): TestbedConfig {
  const { error, value } = testbedConfigSchema.validate(config, validationOptions);

  if (error) {
    throw new ConfigurationError(
      'Configuration validation failed',
      error.details.map(detail => detail.message)
    );
  }

  return value;
}

export function getConfigSchema(): Joi.ObjectSchema<TestbedConfig> {
  return testbedConfigSchema;
}
