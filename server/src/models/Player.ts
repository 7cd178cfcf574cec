// server/src/models/Player.ts


import {
  Model, InferAttributes, InferCreationAttributes, CreationOptional,
  DataTypes, NonAttribute, Sequelize
} from 'sequelize';
import type { Team } from './Team.js';

export class Player extends Model<InferAttributes<Player>, InferCreationAttributes<Player>> {
  declare id: CreationOptional<number>;
  declare playerId: number;
  declare teamId: number | null; // current affiliation; identity is playerId alone
  declare firstName: string;
  declare lastName: string;
  declare position: string | null;
  declare shoots: string | null;
  declare dateOfBirth: string | null;
  declare retired: boolean;

  declare team?: NonAttribute<Team | null>;

  get fullName(): NonAttribute<string> {
    return `${this.firstName} ${this.lastName}`;
  }
}

export function initPlayer(sequelize: Sequelize) {
  Player.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      playerId: { type: DataTypes.INTEGER, allowNull: false, unique: true },
      teamId: { type: DataTypes.INTEGER, allowNull: true },
      firstName: { type: DataTypes.STRING(100), allowNull: false },
      lastName: { type: DataTypes.STRING(100), allowNull: false },
      position: { type: DataTypes.STRING(10), allowNull: true },
      shoots: { type: DataTypes.STRING(1), allowNull: true },
      dateOfBirth: { type: DataTypes.DATEONLY, allowNull: true },
      retired: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false }
    },
    { sequelize, tableName: 'players', modelName: 'Player', timestamps: true, indexes: [{ fields: ['playerId'] }, { fields: ['teamId'] }, { fields: ['lastName', 'firstName'] }] }
  );
  return Player;
}
