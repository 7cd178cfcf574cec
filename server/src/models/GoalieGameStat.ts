// server/src/models/GoalieGameStat.ts

import {
  Model, InferAttributes, InferCreationAttributes, CreationOptional,
  DataTypes, ForeignKey, Sequelize
} from 'sequelize';
import type { Player } from './Player.js';
import type { Team } from './Team.js';
import type { Game } from './Game.js';

export class GoalieGameStat
  extends Model<InferAttributes<GoalieGameStat>, InferCreationAttributes<GoalieGameStat>> {
  declare id: CreationOptional<number>;
  declare gameId: ForeignKey<Game['gameId']>;
  declare season: number;
  declare playerId: ForeignKey<Player['playerId']>;
  declare teamId: ForeignKey<Team['teamId']>;
  declare opponentTeamId: ForeignKey<Team['teamId']>;
  declare shotsAgainst: number;
  declare goalsAgainst: number;
  declare timeOnIce: number | null; // seconds
  declare decision: string | null;  // 'W', 'L', 'OTL'
}

export function initGoalieGameStat(sequelize: Sequelize) {
  GoalieGameStat.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      gameId: { type: DataTypes.INTEGER, allowNull: false },
      season: { type: DataTypes.INTEGER, allowNull: false },
      playerId: { type: DataTypes.INTEGER, allowNull: false },
      teamId: { type: DataTypes.INTEGER, allowNull: false },
      opponentTeamId: { type: DataTypes.INTEGER, allowNull: false },
      shotsAgainst: { type: DataTypes.INTEGER, defaultValue: 0 },
      goalsAgainst: { type: DataTypes.INTEGER, defaultValue: 0 },
      timeOnIce: { type: DataTypes.FLOAT, allowNull: true },
      decision: { type: DataTypes.STRING(5), allowNull: true }
    },
    {
      sequelize,
      tableName: 'goalie_game_stats',
      modelName: 'GoalieGameStat',
      timestamps: true,
      indexes: [
        { fields: ['gameId', 'playerId'], unique: true },
        { fields: ['season', 'playerId'] }
      ]
    }
  );
  return GoalieGameStat;
}
