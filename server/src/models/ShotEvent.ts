// server/src/models/ShotEvent.ts

import {
  Model, InferAttributes, InferCreationAttributes, CreationOptional,
  DataTypes, ForeignKey, Sequelize
} from 'sequelize';
import type { Player } from './Player.js';
import type { Team } from './Team.js';
import type { Game } from './Game.js';

export class ShotEvent
  extends Model<InferAttributes<ShotEvent>, InferCreationAttributes<ShotEvent>> {
  declare id: CreationOptional<number>;
  declare gameId: ForeignKey<Game['gameId']>;
  declare season: number;
  declare period: number;
  declare periodSeconds: number;
  declare shooterId: ForeignKey<Player['playerId']>;
  declare shooterTeamId: ForeignKey<Team['teamId']>;
  declare goalieId: ForeignKey<Player['playerId']> | null; // null on an empty net
  declare defendingTeamId: ForeignKey<Team['teamId']>;
  declare x: number | null; // feet from centre ice, -100..100
  declare y: number | null; // feet from the long axis, -42.5..42.5
  declare zone: string | null; // pre-classified zone, wins over x/y
  declare shotType: string;
  declare isGoal: boolean;
}

export function initShotEvent(sequelize: Sequelize) {
  ShotEvent.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      gameId: { type: DataTypes.INTEGER, allowNull: false },
      season: { type: DataTypes.INTEGER, allowNull: false },
      period: { type: DataTypes.INTEGER, allowNull: false },
      periodSeconds: { type: DataTypes.INTEGER, allowNull: false },
      shooterId: { type: DataTypes.INTEGER, allowNull: false },
      shooterTeamId: { type: DataTypes.INTEGER, allowNull: false },
      goalieId: { type: DataTypes.INTEGER, allowNull: true },
      defendingTeamId: { type: DataTypes.INTEGER, allowNull: false },
      x: { type: DataTypes.FLOAT, allowNull: true },
      y: { type: DataTypes.FLOAT, allowNull: true },
      zone: { type: DataTypes.STRING(20), allowNull: true },
      shotType: { type: DataTypes.STRING(20), allowNull: false, defaultValue: 'wrist' },
      isGoal: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false }
    },
    {
      sequelize,
      tableName: 'shot_events',
      modelName: 'ShotEvent',
      timestamps: false,
      indexes: [
        { fields: ['season'] },
        { fields: ['gameId'] },
        { fields: ['shooterId'] },
        { fields: ['goalieId'] }
      ]
    }
  );
  return ShotEvent;
}
