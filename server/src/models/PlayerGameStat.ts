// server/src/models/PlayerGameStat.ts

import {
  Model, InferAttributes, InferCreationAttributes, CreationOptional,
  DataTypes, ForeignKey, Sequelize
} from 'sequelize';
import type { Player } from './Player.js';
import type { Team } from './Team.js';
import type { Game } from './Game.js';

export class PlayerGameStat
  extends Model<InferAttributes<PlayerGameStat>, InferCreationAttributes<PlayerGameStat>> {
  declare id: CreationOptional<number>;
  declare gameId: ForeignKey<Game['gameId']>;
  declare season: number;
  declare playerId: ForeignKey<Player['playerId']>;
  declare teamId: ForeignKey<Team['teamId']>;
  declare opponentTeamId: ForeignKey<Team['teamId']>;

  declare goals: number;
  declare assists: number;
  declare shotsOnGoal: number;
  declare plusMinus: CreationOptional<number>;
  declare penaltyMinutes: CreationOptional<number>;
  declare timeOnIce: number | null; // seconds
}

export function initPlayerGameStat(sequelize: Sequelize) {
  PlayerGameStat.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      gameId: { type: DataTypes.INTEGER, allowNull: false },
      season: { type: DataTypes.INTEGER, allowNull: false },
      playerId: { type: DataTypes.INTEGER, allowNull: false },
      teamId: { type: DataTypes.INTEGER, allowNull: false },
      opponentTeamId: { type: DataTypes.INTEGER, allowNull: false },

      goals: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      assists: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      shotsOnGoal: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      plusMinus: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      penaltyMinutes: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      timeOnIce: { type: DataTypes.FLOAT, allowNull: true }
    },
    {
      sequelize,
      tableName: 'player_game_stats',
      modelName: 'PlayerGameStat',
      timestamps: true,
      indexes: [
        { fields: ['gameId', 'playerId'], unique: true },
        { fields: ['season', 'playerId'] },
        { fields: ['teamId'] },
        { fields: ['gameId'] }
      ]
    }
  );
  return PlayerGameStat;
}
