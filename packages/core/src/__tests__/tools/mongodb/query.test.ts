/**
 * Query and pipeline construction tests
 */

import { describe, it, expect } from 'vitest';
import {
  bindQuery,
  buildAggregatePipeline,
  buildVectorSearchPipeline,
} from '../../../tools/mongodb/query.js';
import { ParamValues } from '../../../tools/types.js';
import { MissingOrInvalidParameterError } from '../../../utils/errors.js';

const options = { numCandidates: 10, limit: 10 };

function values(map: Record<string, unknown>): ParamValues {
  return new ParamValues(Object.entries(map).map(([name, value]) => ({ name, value })));
}

describe('bindQuery', () => {
  it('should overlay parameters onto the template', () => {
    const template = { status: 'active', _id: 0 };
    const filter = bindQuery(template, values({ _id: 7, name: 'Alice' }));
    expect(filter).toEqual({ status: 'active', _id: 7, name: 'Alice' });
  });

  it('should never mutate the template', () => {
    const template = { status: 'active' };
    bindQuery(template, values({ status: 'archived' }));
    bindQuery(template, values({ owner: 'bob' }));
    expect(template).toEqual({ status: 'active' });
  });

  it('should return a fresh document for each call', () => {
    const template = { status: 'active' };
    const first = bindQuery(template, values({ _id: 1 }));
    const second = bindQuery(template, values({ _id: 2 }));
    expect(first).toEqual({ status: 'active', _id: 1 });
    expect(second).toEqual({ status: 'active', _id: 2 });
  });

  it('should skip excluded names', () => {
    expect(bindQuery({}, values({ a: 1, b: 2 }), ['b'])).toEqual({ a: 1 });
  });
});

describe('buildAggregatePipeline', () => {
  it('should build one stage per parameter', () => {
    const pipeline = buildAggregatePipeline(values({ $match: { a: 1 }, $limit: 5 }));
    expect(pipeline).toEqual([{ $match: { a: 1 } }, { $limit: 5 }]);
  });
});

describe('buildVectorSearchPipeline', () => {
  const vectorParams = {
    indexName: 'vec_idx',
    queryVector: [0.1, 0.2, 0.3],
    path: 'embedding',
  };

  it('should end with a $vectorSearch stage', () => {
    const plan = buildVectorSearchPipeline({}, values(vectorParams), options);

    expect(plan.path).toBe('embedding');
    expect(plan.pipeline).toEqual([
      {
        $vectorSearch: {
          index: 'vec_idx',
          queryVector: [0.1, 0.2, 0.3],
          path: 'embedding',
          numCandidates: 10,
          limit: 10,
        },
      },
    ]);
  });

  it('should put remaining filters in a $match pre-stage', () => {
    const plan = buildVectorSearchPipeline(
      { published: true },
      values({ ...vectorParams, category: 'news' }),
      options
    );

    expect(plan.pipeline).toHaveLength(2);
    expect(plan.pipeline[0]).toEqual({ $match: { published: true, category: 'news' } });
    expect(plan.pipeline[1]?.$vectorSearch).toBeDefined();
  });

  it('should use the configured tuning values', () => {
    const plan = buildVectorSearchPipeline({}, values(vectorParams), {
      numCandidates: 100,
      limit: 3,
    });
    expect(plan.pipeline[0]?.$vectorSearch).toMatchObject({ numCandidates: 100, limit: 3 });
  });

  it.each([
    ['indexName', { queryVector: [0.1], path: 'embedding' }],
    ['queryVector', { indexName: 'vec_idx', path: 'embedding' }],
    ['path', { indexName: 'vec_idx', queryVector: [0.1] }],
  ])('should report missing %s', (name, input) => {
    try {
      buildVectorSearchPipeline({}, values(input), options);
      expect.fail('expected a parameter error');
    } catch (error) {
      expect(error).toBeInstanceOf(MissingOrInvalidParameterError);
      if (error instanceof MissingOrInvalidParameterError) {
        expect(error.parameter).toBe(name);
      }
    }
  });

  it('should reject a non-numeric vector', () => {
    expect(() =>
      buildVectorSearchPipeline({}, values({ ...vectorParams, queryVector: ['a', 'b'] }), options)
    ).toThrow('parameter must be an array of numbers: "queryVector"');
  });

  it('should reject a non-string index name', () => {
    expect(() =>
      buildVectorSearchPipeline({}, values({ ...vectorParams, indexName: 42 }), options)
    ).toThrow('parameter must be a non-empty string: "indexName"');
  });
});
