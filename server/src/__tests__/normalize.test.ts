import { describe, it, expect } from 'vitest';
import { normalizePosting, normalizePostings } from '../agents/normalize.js';
import { htmlToText } from '../lib/clean-text.js';
import type { Posting } from '../agents/types.js';

describe('normalizePosting', () => {
  it('reads a well-formed flat record back field for field', () => {
    const record: Posting = {
      id: 'P1',
      title: 'Data Analyst',
      company: 'Acme',
      location: 'Singapore',
      salary_text: 'SGD 4,000-5,000 per month',
      category: 'Information Technology',
      description: 'Use std::vector<int> and std::map<K, V> daily.\n  - Write tests\n  - Ship code',
      url: 'https://jobs.example.com/p1',
    };

    expect(normalizePosting(record, 0)).toEqual(record);
  });

  it('reads the company from alternate flat keys', () => {
    expect(normalizePosting({ id: 'F1', title: 'Analyst', description: 'D', company_name: 'Acme' }, 0).company).toBe('Acme');
    expect(normalizePosting({ id: 'F2', title: 'Analyst', description: 'D', CompanyName: 'Globex' }, 0).company).toBe('Globex');
  });

  it('flattens the nested job-board shape', () => {
    const raw = {
      job: {
        id: 'J-1',
        Title: '<b>Data Engineer</b>',
        JobDescription: '<p>Build pipelines.</p><ul><li>Python</li><li>SQL &amp; dbt</li></ul>',
        id_Job_Salary: 4000,
        id_Job_MaxSalary: '6,000',
        id_Job_Currency: { caption: 'SGD' },
        id_Job_Interval: { caption: 'month' },
        JobCategory: [{ caption: 'IT' }, { caption: 'Data' }],
        url: 'https://board.example.com/j/1',
      },
      company: {
        CompanyName: 'Acme Pte Ltd',
        GooglePlace: { address: '1 Raffles Place, Singapore' },
      },
    };

    expect(normalizePosting(raw, 0)).toEqual({
      id: 'J-1',
      title: 'Data Engineer',
      company: 'Acme Pte Ltd',
      location: '1 Raffles Place, Singapore',
      salary_text: 'SGD 4,000-6,000 per month',
      category: 'IT, Data',
      description: 'Build pipelines.\nPython\nSQL & dbt',
      url: 'https://board.example.com/j/1',
    });
  });

  it('fills defaults for optional fields', () => {
    expect(normalizePosting({ id: 42, title: 'Barista', description: 'Make coffee.', url: 'www.example.com' }, 0)).toEqual({
      id: '42',
      title: 'Barista',
      company: 'Company Not Specified',
      location: 'Location Not Specified',
      salary_text: null,
      category: null,
      description: 'Make coffee.',
      url: null,
    });
  });

  it('requires a description', () => {
    expect(() => normalizePosting({ id: 'C', title: 'Cook' }, 2)).toThrow('Posting C is missing required field "description"');
  });
});

describe('normalizePostings', () => {
  it('drops invalid and duplicate records and reports each one', () => {
    const { output, failures } = normalizePostings([
      { id: 'A', title: 'Analyst', description: 'D' },
      { title: 'No id', description: 'D' },
      { id: 'B', description: 'D' },
      { id: 'A', title: 'Again', description: 'D' },
      'not an object',
    ]);

    expect(output.map((p) => p.id)).toEqual(['A']);
    expect(output[0].title).toBe('Analyst');
    expect(failures).toEqual([
      { item: '#1', stage: 'normalizing', code: 'VALIDATION_ERROR', message: 'Posting #1 is missing required field "id"' },
      { item: 'B', stage: 'normalizing', code: 'VALIDATION_ERROR', message: 'Posting B is missing required field "title"' },
      { item: 'A', stage: 'normalizing', code: 'VALIDATION_ERROR', message: 'Duplicate posting id "A" at #3' },
      { item: '#4', stage: 'normalizing', code: 'VALIDATION_ERROR', message: 'Posting #4 is not an object' },
    ]);
  });

  it('names a dropped record by any id it carries', () => {
    const { failures } = normalizePostings([
      { id: 7, title: 'Numeric id' },
      { job: { id: 'J-9', title: 'Nested' } },
    ]);

    expect(failures.map((f) => [f.item, f.message])).toEqual([
      ['7', 'Posting 7 is missing required field "description"'],
      ['J-9', 'Posting J-9 is missing required field "description"'],
    ]);
  });

  it('returns empty output for an empty batch', () => {
    expect(normalizePostings([])).toEqual({ output: [], failures: [] });
  });
});

describe('htmlToText', () => {
  it('keeps line breaks and collapses spaces and blank lines', () => {
    expect(htmlToText('Line&nbsp;one<br>  Line   two\n\n\n\n&bull; point')).toBe('Line one\nLine two\n\n• point');
  });

  it('leaves text without markup untouched', () => {
    const text = 'Templates like vector<int> and a <b, c> pair.\n    indented   line';
    expect(htmlToText(text)).toBe(text);
  });

  it('strips known tags but keeps angle-bracket text beside them', () => {
    expect(htmlToText('<p>Use Map<K, V></p>')).toBe('Use Map<K, V>');
  });
});
