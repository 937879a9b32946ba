import { sequelize } from "../connection";
import { DataTypes, Model } from "sequelize";
import { IAuthor, IAuthorFields } from "../../base-data-connector";

export const Author = sequelize.define<Model<IAuthor, IAuthorFields>, IAuthorFields>('author', {
    firstName: { type: DataTypes.STRING(50), allowNull: false },
    lastName: { type: DataTypes.STRING(50), allowNull: false },
    birthDate: { type: DataTypes.DATEONLY, allowNull: true },
    nationality: { type: DataTypes.STRING(50), allowNull: true },
});
