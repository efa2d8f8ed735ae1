/**
 * Skill Service - application-facing entry point for skills
 */

import type { ResourceError } from '../../base/utils/errors.js';
import type { Skill, SkillDiscoveryResult, SkillInfo, SkillManagerPort } from './types.js';

export class SkillService {
  private readonly manager: SkillManagerPort;

  constructor(manager: SkillManagerPort | null | undefined) {
    if (!manager) {
      throw new Error('skill manager is required');
    }
    this.manager = manager;
  }

  discoverSkills(): Promise<SkillDiscoveryResult> {
    return this.manager.discover();
  }

  loadSkill(name: string): Promise<Skill> {
    return this.manager.loadFullMetadata(name);
  }

  activateSkill(name: string): Promise<boolean> {
    return this.manager.activate(name);
  }

  deactivateSkill(name: string): Promise<boolean> {
    return this.manager.deactivate(name);
  }

  getSkillByName(name: string): Promise<SkillInfo> {
    return this.manager.getByName(name);
  }

  /**
   * Skills currently available to the agent
   */
  getAvailableSkills(): Promise<SkillInfo[]> {
    return this.manager.listActive();
  }

  listSkills(): Promise<SkillInfo[]> {
    return this.manager.listAll();
  }

  validateSkills(): Promise<Map<string, ResourceError>> {
    return this.manager.validateAll();
  }
}
