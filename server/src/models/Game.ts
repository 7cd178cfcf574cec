// server/src/models/Game.ts

import {
  Model, InferAttributes, InferCreationAttributes, CreationOptional,
  DataTypes, ForeignKey, Sequelize
} from 'sequelize';
import type { Team } from './Team.js';

export class Game extends Model<InferAttributes<Game>, InferCreationAttributes<Game>> {
  declare id: CreationOptional<number>;
  declare gameId: number;
  declare season: number;
  declare date: string; // YYYY-MM-DD
  declare gameType: 'regular' | 'playoff';
  declare homeTeamId: ForeignKey<Team['teamId']>;
  declare awayTeamId: ForeignKey<Team['teamId']>;
  declare homeScore: number | null; // null until played
  declare awayScore: number | null;
  declare overtime: boolean;
  declare shootout: boolean;
}

export function initGame(sequelize: Sequelize) {
  Game.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      gameId: { type: DataTypes.INTEGER, allowNull: false, unique: true },
      season: { type: DataTypes.INTEGER, allowNull: false },
      date: { type: DataTypes.DATEONLY, allowNull: false },
      gameType: { type: DataTypes.STRING(10), allowNull: false, defaultValue: 'regular' },
      homeTeamId: { type: DataTypes.INTEGER, allowNull: false },
      awayTeamId: { type: DataTypes.INTEGER, allowNull: false },
      homeScore: { type: DataTypes.INTEGER, allowNull: true },
      awayScore: { type: DataTypes.INTEGER, allowNull: true },
      overtime: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false },
      shootout: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false }
    },
    {
      sequelize,
      tableName: 'games',
      modelName: 'Game',
      timestamps: true,
      indexes: [
        { fields: ['season', 'date'] },
        { fields: ['homeTeamId'] },
        { fields: ['awayTeamId'] }
      ]
    }
  );
  return Game;
}
