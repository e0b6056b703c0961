import { decode, decodeList } from '../lib/decode';
import { SolverConfigurationSchema, type SolverConfiguration } from '../types/models';
import { Resource, segment, type ResourceConfig } from './resource';

export class Solvers extends Resource {
  static readonly resourcePath = 'solvers/';

  constructor(config: ResourceConfig = {}) {
    super(config, Solvers.resourcePath);
  }

  async listSolvers(): Promise<SolverConfiguration[]> {
    const solvers = await this.session.get('remote/');
    return decodeList(SolverConfigurationSchema, solvers, 'solver configuration');
  }

  async getSolver(solverId: string): Promise<SolverConfiguration> {
    const solver = await this.session.get(`remote/${segment(solverId, 'Solver id')}`);
    return decode(SolverConfigurationSchema, solver, 'solver configuration');
  }
}
