import { describe, it, expect } from 'vitest';
import { friendlyTitleFromFileName } from '../utils/friendly-title';

describe('friendlyTitleFromFileName', () => {
  it('drops ordering prefixes and filler words', () => {
    expect(friendlyTitleFromFileName('01_Introduction_to_Finance')).toBe('Introduction Finance');
    expect(friendlyTitleFromFileName('1_1_Introduction_Concept_Overview')).toBe('Introduction Concept Overview');
  });

  it('drops the file extension and directories', () => {
    expect(friendlyTitleFromFileName('/courses/finance/03-Marketing_Analysis.pdf')).toBe('Marketing Analysis');
  });

  it('keeps numbers that follow words', () => {
    expect(friendlyTitleFromFileName('module-4-ROI-Analysis-part-2')).toBe('4 ROI Analysis Part 2');
    expect(friendlyTitleFromFileName('financial_planning-basics_101')).toBe('Financial Planning Basics 101');
  });

  it('preserves acronyms and capitalizes lower-case words', () => {
    expect(friendlyTitleFromFileName('02_ROI_Analysis_for_MBA_students')).toBe('ROI Analysis For MBA Students');
  });

  it('upper-cases roman numerals', () => {
    expect(friendlyTitleFromFileName('Part_ii_Advanced_Topics')).toBe('Part II Advanced Topics');
  });

  it('does not treat a dotted section number as an extension', () => {
    expect(friendlyTitleFromFileName('1.3 - Operations Management BADM 567 Live Session')).toBe(
      '1.3 Operations Management BADM 567 Live Session'
    );
  });

  it('keeps articles and drops structural words', () => {
    expect(friendlyTitleFromFileName('the-importance-of-market-research')).toBe('The Importance Market Research');
    expect(friendlyTitleFromFileName('intro_to_the_course_of_finance')).toBe('Intro The Finance');
    expect(friendlyTitleFromFileName('lessons_about_a_plan')).toBe('About A Plan');
    expect(friendlyTitleFromFileName('Modules_and_Courses_Overview')).toBe('Overview');
  });

  it('handles course video file names', () => {
    expect(friendlyTitleFromFileName('01_01_welcome-to-operations-management-organization-and-analysis')).toBe(
      'Welcome Operations Management Organization Analysis'
    );
    expect(friendlyTitleFromFileName('01_03_meet-professor-jane-doe')).toBe('Meet Professor Jane Doe');
    expect(friendlyTitleFromFileName('05_01_inventory-process-cash-cycle-and-inventory-metrics')).toBe(
      'Inventory Process Cash Cycle Inventory Metrics'
    );
    expect(friendlyTitleFromFileName('04_01_x-bar-r-charts-for-measurement-data')).toBe(
      'X Bar R Charts For Measurement Data'
    );
    expect(friendlyTitleFromFileName('cost-framework-2-behavior-example')).toBe('Cost Framework 2 Behavior Example');
    expect(friendlyTitleFromFileName('conducting-market-research-part-1')).toBe('Conducting Market Research Part 1');
  });

  it('falls back to a generic title for blank input', () => {
    expect(friendlyTitleFromFileName('')).toBe('Title');
    expect(friendlyTitleFromFileName('   ')).toBe('Title');
  });

  it('falls back to Content when almost nothing is left', () => {
    expect(friendlyTitleFromFileName('01_to_of')).toBe('Content');
    expect(friendlyTitleFromFileName('02_ab.pdf')).toBe('Content');
  });
});
