import type { HclMap, ResourceConfig } from '@tfcanvas/contracts';
import { bool, float, int, list, map, raw, str, toHclMap } from '@tfcanvas/config-tree';
import { describe, expect, it } from 'vitest';

import { HclRenderError } from '../src/format';
import { HclWriter, render } from '../src/HclWriter';
import { sanitizeName } from '../src/sanitize';

function resource(resourceType: string, resourceName: string, config: HclMap): ResourceConfig {
  return { resourceType, resourceName, config };
}

describe('HclWriter', () => {
  const writer = new HclWriter();

  describe('resource blocks', () => {
    it('should render nested maps as blocks and sanitize the name', () => {
      const bucket = resource('aws_s3_bucket', 'My Bucket', toHclMap({ bucket: str('my-bucket'), tags: map({ Env: str('Dev') }) }));

      expect(writer.renderResourceBlock(bucket)).toBe(
        ['resource "aws_s3_bucket" "my_bucket" {', '  bucket = "my-bucket"', '  tags {', '    Env = "Dev"', '  }', '}', ''].join('\n')
      );
    });

    it('should render booleans and numbers bare', () => {
      const db = resource('aws_db_instance', 'db', toHclMap({ multi_az: bool(false), allocated_storage: int(20), ratio: float(0.25), weight: float(2) }));

      expect(writer.renderResourceBlock(db)).toBe(
        'resource "aws_db_instance" "db" {\n  multi_az = false\n  allocated_storage = 20\n  ratio = 0.25\n  weight = 2.0\n}\n'
      );
    });

    it.each(['var.region', 'local.prefix', 'module.vpc.id', 'data.aws_ami.ubuntu.id'])('should leave reference %s unquoted', (reference) => {
      const block = writer.renderResourceBlock(resource('aws_instance', 'web', toHclMap({ ami: str(reference) })));
      expect(block).toContain(`  ami = ${reference}\n`);
    });

    it('should quote strings that only resemble references', () => {
      const block = writer.renderResourceBlock(resource('aws_instance', 'web', toHclMap({ note: str('variable.x'), other: str('vars.y') })));
      expect(block).toContain('  note = "variable.x"\n');
      expect(block).toContain('  other = "vars.y"\n');
    });

    it('should render an empty list as an empty array', () => {
      const block = writer.renderResourceBlock(resource('aws_security_group', 'sg', toHclMap({ ingress: list() })));
      expect(block).toBe('resource "aws_security_group" "sg" {\n  ingress = []\n}\n');
    });

    it('should render a list of maps as repeated blocks', () => {
      const sg = resource(
        'aws_security_group',
        'web-sg',
        toHclMap({
          ingress: list(map({ from_port: int(80), cidr_blocks: list(str('0.0.0.0/0')) }), map({ from_port: int(443), cidr_blocks: list() })),
        })
      );

      expect(writer.renderResourceBlock(sg)).toBe(
        [
          'resource "aws_security_group" "web_sg" {',
          '  ingress {',
          '    from_port = 80',
          '    cidr_blocks = ["0.0.0.0/0"]',
          '  }',
          '  ingress {',
          '    from_port = 443',
          '    cidr_blocks = []',
          '  }',
          '}',
          '',
        ].join('\n')
      );
    });

    it('should format each scalar of a plain list', () => {
      const block = writer.renderResourceBlock(
        resource('x_thing', 't', toHclMap({ values: list(str('a'), str('var.b'), bool(true), int(3), float(1.5), list(int(1), int(2))) }))
      );
      expect(block).toContain('  values = ["a", var.b, true, 3, 1.5, [1, 2]]\n');
    });

    it('should emit raw values verbatim', () => {
      const block = writer.renderResourceBlock(resource('x_thing', 't', toHclMap({ kms_key_id: raw('null') })));
      expect(block).toContain('  kms_key_id = null\n');
    });

    it('should render an empty map as an empty block', () => {
      expect(writer.renderProviderBlock({ providerName: 'azurerm', settings: toHclMap({ features: map() }) })).toBe(
        'provider "azurerm" {\n  features {\n  }\n}\n'
      );
    });

    it('should reject lists that mix blocks and plain values', () => {
      const bad = resource('x_thing', 't', toHclMap({ rules: list(map({ a: int(1) }), str('b')) }));
      expect(() => writer.renderResourceBlock(bad)).toThrow(HclRenderError);
    });

    it('should reject maps nested inside a plain list', () => {
      const bad = resource('x_thing', 't', toHclMap({ rules: list(list(map({ a: int(1) }))) }));
      expect(() => writer.renderResourceBlock(bad)).toThrow(/inside a list/);
    });
  });

  describe('string escaping', () => {
    const config = toHclMap({ description: str('say "hi"\\now\nplease') });

    it('should escape quotes, backslashes and newlines by default', () => {
      expect(writer.renderResourceBlock(resource('x_thing', 't', config))).toContain('  description = "say \\"hi\\"\\\\now\\nplease"\n');
    });

    it('should keep the text untouched when escaping is disabled', () => {
      const legacy = new HclWriter({ escapeStrings: false });
      expect(legacy.renderResourceBlock(resource('x_thing', 't', config))).toContain('  description = "say "hi"\\now\nplease"\n');
    });

    it('should keep interpolation sequences', () => {
      const block = writer.renderResourceBlock(resource('x_thing', 't', toHclMap({ name: str('${var.env}-bucket') })));
      expect(block).toContain('  name = "${var.env}-bucket"\n');
    });
  });

  describe('provider blocks', () => {
    it('should render provider settings', () => {
      expect(writer.renderProviderBlock({ providerName: 'aws', settings: toHclMap({ region: str('us-west-2') }) })).toBe(
        'provider "aws" {\n  region = "us-west-2"\n}\n'
      );
    });
  });

  describe('terraform block', () => {
    it('should always include the version pragma', () => {
      expect(writer.renderTerraformBlock()).toBe('terraform {\n  required_version = ">= 1.0.0"\n}\n');
    });

    it('should include a backend when type and settings are given', () => {
      const block = writer.renderTerraformBlock({
        backendType: 's3',
        settings: toHclMap({ bucket: str('state-bucket'), encrypt: bool(true) }),
      });

      expect(block).toBe(
        'terraform {\n  required_version = ">= 1.0.0"\n  backend "s3" {\n    bucket = "state-bucket"\n    encrypt = true\n  }\n}\n'
      );
    });

    it('should omit a backend without settings', () => {
      expect(writer.renderTerraformBlock({ backendType: 'local', settings: new Map() })).not.toContain('backend');
    });

    it('should use the configured required version', () => {
      expect(new HclWriter({ requiredVersion: '>= 1.5.0' }).renderTerraformBlock()).toContain('required_version = ">= 1.5.0"');
    });
  });

  describe('render', () => {
    const providers = new Map<string, HclMap>([
      ['aws', toHclMap({ region: str('us-west-2') })],
      ['azurerm', toHclMap({ features: map() })],
    ]);
    const resources = [
      resource('aws_s3_bucket', 'logs', toHclMap({ bucket: str('logs') })),
      resource('azurerm_resource_group', 'rg', toHclMap({ name: str('rg'), location: str('East US') })),
    ];

    it('should order providers before resources with one blank line between blocks', () => {
      expect(render(resources, providers)).toBe(
        [
          'provider "aws" {',
          '  region = "us-west-2"',
          '}',
          '',
          'provider "azurerm" {',
          '  features {',
          '  }',
          '}',
          '',
          'resource "aws_s3_bucket" "logs" {',
          '  bucket = "logs"',
          '}',
          '',
          'resource "azurerm_resource_group" "rg" {',
          '  name = "rg"',
          '  location = "East US"',
          '}',
          '',
        ].join('\n')
      );
    });

    it('should put the terraform block first when a backend is given', () => {
      const output = render([], new Map([['aws', toHclMap({ region: str('eu-west-1') })]]), { backendType: 'local', settings: toHclMap({ path: str('tf.state') }) });

      expect(output).toBe(
        'terraform {\n  required_version = ">= 1.0.0"\n  backend "local" {\n    path = "tf.state"\n  }\n}\n\nprovider "aws" {\n  region = "eu-west-1"\n}\n'
      );
    });

    it('should be deterministic', () => {
      expect(render(resources, providers)).toBe(render(resources, providers));
    });

    it('should render nothing for an empty document', () => {
      expect(render([], new Map())).toBe('');
    });
  });
});

describe('sanitizeName', () => {
  it.each([
    ['My Bucket', 'my_bucket'],
    ['web-server-01', 'web_server_01'],
    ['a.b/c', 'a_b_c'],
    ['already_safe', 'already_safe'],
  ])('should turn %s into %s', (input, expected) => {
    expect(sanitizeName(input)).toBe(expected);
  });

  it('should be idempotent', () => {
    for (const name of ['My Bucket', 'Prod DB #2', 'x-y z']) expect(sanitizeName(sanitizeName(name))).toBe(sanitizeName(name));
  });
});
