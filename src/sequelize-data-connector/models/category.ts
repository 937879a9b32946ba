import { sequelize } from "../connection";
import { DataTypes, Model } from "sequelize";
import { ICategory, ICategoryFields } from "../../base-data-connector";

export const Category = sequelize.define<Model<ICategory, ICategoryFields>, ICategoryFields>('category', {
    name: { type: DataTypes.STRING(100), allowNull: false, unique: true },
    description: { type: DataTypes.TEXT, allowNull: true },
});
