export { assignRole, assignRoleByNonce, assignRoles, createRoleNonce } from './role-assigner.js';
