/**
 * Skill Service Tests
 */

import { describe, it, expect, jest } from '@jest/globals';
import { SkillService } from './service.js';
import type { Skill, SkillInfo, SkillManagerPort } from './types.js';
import { ResourceNotFoundError } from '../../base/utils/errors.js';

const info: SkillInfo = {
  name: 'pdf',
  description: 'PDF',
  allowedTools: [],
  extensions: {},
  sourceType: 'project',
  directoryPath: '/skills/pdf',
  isActive: true,
};

const skill: Skill = {
  name: 'pdf',
  description: 'PDF',
  allowedTools: [],
  extensions: {},
  sourceType: 'project',
  directoryPath: '/skills/pdf',
  originalPath: '/skills/pdf',
  rawFrontmatter: 'name: pdf\ndescription: PDF',
  body: 'Body',
};

function createPort(): jest.Mocked<SkillManagerPort> {
  return {
    discover: jest.fn<SkillManagerPort['discover']>().mockResolvedValue({
      resources: [info],
      rootsSearched: ['/skills'],
      totalCount: 1,
      activeCount: 1,
    }),
    loadFullMetadata: jest.fn<SkillManagerPort['loadFullMetadata']>().mockResolvedValue(skill),
    activate: jest.fn<SkillManagerPort['activate']>().mockResolvedValue(true),
    deactivate: jest.fn<SkillManagerPort['deactivate']>().mockResolvedValue(false),
    getByName: jest.fn<SkillManagerPort['getByName']>().mockResolvedValue(info),
    listActive: jest.fn<SkillManagerPort['listActive']>().mockResolvedValue([info]),
    listAll: jest.fn<SkillManagerPort['listAll']>().mockResolvedValue([info]),
    validateAll: jest.fn<SkillManagerPort['validateAll']>().mockResolvedValue(new Map()),
  };
}

describe('SkillService', () => {
  it('should require a manager', () => {
    expect(() => new SkillService(null)).toThrow('skill manager is required');
    expect(() => new SkillService(undefined)).toThrow('skill manager is required');
  });

  it('should forward every call to the manager', async () => {
    const port = createPort();
    const service = new SkillService(port);

    expect((await service.discoverSkills()).totalCount).toBe(1);
    expect(await service.loadSkill('pdf')).toBe(skill);
    expect(await service.activateSkill('pdf')).toBe(true);
    expect(await service.deactivateSkill('pdf')).toBe(false);
    expect(await service.getSkillByName('pdf')).toBe(info);
    expect(await service.getAvailableSkills()).toEqual([info]);
    expect(await service.listSkills()).toEqual([info]);
    expect((await service.validateSkills()).size).toBe(0);

    expect(port.loadFullMetadata).toHaveBeenCalledWith('pdf');
    expect(port.activate).toHaveBeenCalledWith('pdf');
    expect(port.deactivate).toHaveBeenCalledWith('pdf');
    expect(port.getByName).toHaveBeenCalledWith('pdf');
  });

  it('should pass manager errors through', async () => {
    const port = createPort();
    port.getByName.mockRejectedValue(new ResourceNotFoundError('Skill', 'missing'));
    const service = new SkillService(port);

    await expect(service.getSkillByName('missing')).rejects.toThrow('Skill "missing" not found');
  });
});
