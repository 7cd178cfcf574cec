// server/src/models/ScoringEvent.ts

import {
  Model, InferAttributes, InferCreationAttributes, CreationOptional,
  DataTypes, ForeignKey, Sequelize
} from 'sequelize';
import type { Player } from './Player.js';
import type { Team } from './Team.js';
import type { Game } from './Game.js';

export class ScoringEvent
  extends Model<InferAttributes<ScoringEvent>, InferCreationAttributes<ScoringEvent>> {
  declare id: CreationOptional<number>;
  declare gameId: ForeignKey<Game['gameId']>;
  declare season: number;
  declare playerId: ForeignKey<Player['playerId']>;
  declare teamId: ForeignKey<Team['teamId']>;
  declare kind: 'goal' | 'assist' | 'shot';
  declare period: number;
  declare periodSeconds: number;
}

export function initScoringEvent(sequelize: Sequelize) {
  ScoringEvent.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      gameId: { type: DataTypes.INTEGER, allowNull: false },
      season: { type: DataTypes.INTEGER, allowNull: false },
      playerId: { type: DataTypes.INTEGER, allowNull: false },
      teamId: { type: DataTypes.INTEGER, allowNull: false },
      kind: { type: DataTypes.STRING(10), allowNull: false },
      period: { type: DataTypes.INTEGER, allowNull: false },
      periodSeconds: { type: DataTypes.INTEGER, allowNull: false }
    },
    {
      sequelize,
      tableName: 'scoring_events',
      modelName: 'ScoringEvent',
      timestamps: false,
      indexes: [
        { fields: ['season', 'playerId'] },
        { fields: ['gameId'] }
      ]
    }
  );
  return ScoringEvent;
}
