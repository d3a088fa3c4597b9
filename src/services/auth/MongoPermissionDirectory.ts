import mongoose from 'mongoose';
import { IUser, User } from '../../models/User';
import { Role } from '../../models/Role';
import { RolePermission } from '../../models/RolePermission';
import { PermissionDirectory, RoleRecord, UserRecord } from './types';

const toUserRecord = (user: IUser): UserRecord => ({
  id: user._id.toString(),
  username: user.username,
  name: user.name,
  passwordHash: user.passwordHash,
  roleId: user.roleId ? user.roleId.toString() : null,
});

export class MongoPermissionDirectory implements PermissionDirectory {
  async findUserByUsername(username: string): Promise<UserRecord | null> {
    const user = await User.findOne({ username });
    return user ? toUserRecord(user) : null;
  }

  async findUserById(id: string): Promise<UserRecord | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const user = await User.findById(id);
    return user ? toUserRecord(user) : null;
  }

  async findRole(roleId: string): Promise<RoleRecord | null> {
    if (!mongoose.isValidObjectId(roleId)) return null;
    const role = await Role.findById(roleId);
    return role ? { id: role._id.toString(), name: role.name } : null;
  }

  async listPages(roleId: string): Promise<string[]> {
    const permissions = await RolePermission.find({ roleId }).sort({ pageName: 1 });
    return permissions.map((permission) => permission.pageName);
  }
}
