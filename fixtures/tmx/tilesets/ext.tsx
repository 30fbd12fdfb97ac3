<?xml version="1.0" encoding="UTF-8"?>
<tileset version="1.10" name="ext" firstgid="40" tilewidth="2" tileheight="2">
 <properties>
  <property name="margin" value="none"/>
 </properties>
 <image source="../tiles.png" width="8" height="2"/>
</tileset>
