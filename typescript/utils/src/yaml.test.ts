import { expect } from 'chai';
import sinon from 'sinon';

import { rootLogger } from './logging.js';
import { toYamlString, tryParseJsonOrYaml } from './yaml.js';

describe('tryParseJsonOrYaml', () => {
  it('parses JSON', () => {
    const result = tryParseJsonOrYaml('{"network": "alpha", "fee": 5}');
    expect(result).to.deep.equal({
      success: true,
      data: { network: 'alpha', fee: 5 },
    });
  });

  it('parses YAML', () => {
    const result = tryParseJsonOrYaml('network: alpha\nfee: "5"\n');
    expect(result).to.deep.equal({
      success: true,
      data: { network: 'alpha', fee: '5' },
    });
  });

  it('returns a failure for invalid input', () => {
    const loggerStub = sinon.stub(rootLogger, 'error');
    try {
      const result = tryParseJsonOrYaml('{"network": ');
      expect(result).to.deep.equal({
        success: false,
        error: 'Input is not valid JSON or YAML',
      });
      expect(loggerStub.calledOnce).to.be.true;
    } finally {
      loggerStub.restore();
    }
  });
});

describe('toYamlString', () => {
  it('serializes nested data', () => {
    expect(toYamlString({ a: { b: [1, 2] } })).to.equal(
      'a:\n  b:\n    - 1\n    - 2\n',
    );
  });
});
