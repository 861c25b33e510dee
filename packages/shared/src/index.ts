export * from './logger';
export * from './config';
export * from './errors';
export * from './types';

// OpenDRIVE builder
export * from './opendrive';

// OpenSCENARIO positions on the generated roads
export * as openscenario from './openscenario';
